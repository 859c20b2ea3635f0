/**
 * Module `client/src/app.ts`: wire formatting, slideshows, cookies and live reload into the page.
 */

import { resolveClientConfig, type ClientConfig } from "./config";
import { getCookie, removeCookie, setCookie, setToughCookie } from "./data/cookies";
import { LiveReloadClient } from "./live-reload";
import { bindHoverSlideshows, HoverSlideshow } from "./slideshow/hover-slideshow";
import { createFormatters } from "./text/formatters";
import { processAllText } from "./text/process-text";

export const PAGE_SWAPPED_EVENT = "page:swapped";

export interface PrivtubeApi {
  refresh: (root?: ParentNode) => void;
  processAllText: (root?: ParentNode) => number;
  runHoverSlideshow: (entry: Element) => void;
  stopHoverSlideshow: (entry: Element) => void;
  getCookie: typeof getCookie;
  setCookie: typeof setCookie;
  setToughCookie: typeof setToughCookie;
  removeCookie: typeof removeCookie;
}

declare global {
  interface Window {
    privtube?: PrivtubeApi;
  }
}

/**
 * Handle create api.
 */
export function createApi(config: ClientConfig): PrivtubeApi {
  const formatters = createFormatters({ locale: config.locale, timeZone: config.timeZone });
  const slideshow = new HoverSlideshow({ intervalMs: config.slideshowIntervalMs });
  const formatSubtree = (root: ParentNode = document) =>
    processAllText(root, formatters, { invalidPlaceholder: config.invalidNumberPlaceholder });

  return {
    refresh: (root = document) => {
      formatSubtree(root);
      bindHoverSlideshows(root, slideshow);
    },
    processAllText: formatSubtree,
    runHoverSlideshow: (entry) => slideshow.enter(entry),
    stopHoverSlideshow: (entry) => slideshow.leave(entry),
    getCookie,
    setCookie,
    setToughCookie,
    removeCookie,
  };
}

/**
 * Handle install.
 */
export function install(config: ClientConfig = resolveClientConfig()): PrivtubeApi {
  const api = createApi(config);
  window.privtube = api;

  if (document.readyState === "loading") {
    document.addEventListener("DOMContentLoaded", () => api.refresh(), { once: true });
  } else {
    api.refresh();
  }
  document.addEventListener(PAGE_SWAPPED_EVENT, (event) => {
    api.refresh(isParentNode(event.target) ? event.target : document);
  });

  if (config.liveReload) {
    new LiveReloadClient().start();
  }
  return api;
}

function isParentNode(target: EventTarget | null): target is Element | Document {
  return target instanceof Element || target instanceof Document;
}
