/**
 * Module `client/src/slideshow/hover-slideshow.ts`: cycle gallery thumbnails while the pointer rests on an entry.
 */

export const THUMBNAILS_SELECTOR = ".hover-thumbnails";
export const CURRENT_CLASS = "current";
export const DEFERRED_SOURCE_ATTRIBUTE = "to-load";

export interface HoverSlideshowOptions {
  intervalMs?: number;
}

type SlideshowPhase =
  | { name: "idle" }
  | { name: "pending-load"; image: HTMLImageElement; listener: () => void }
  | { name: "scheduled"; timer: number };

const boundEntries = new WeakSet<Element>();

interface EntryState {
  currentIndex: number;
  phase: SlideshowPhase;
}

/**
 * Represent hover slideshow behavior.
 * At most one continuation (load listener or timer) is pending per entry.
 */
export class HoverSlideshow {
  private readonly intervalMs: number;
  private readonly states = new WeakMap<Element, EntryState>();

  constructor(options: HoverSlideshowOptions = {}) {
    this.intervalMs = options.intervalMs ?? 1000;
  }

  enter(entry: Element): void {
    this.start(entry);
  }

  /** Cancels whatever continuation is pending, so nothing advances after this. */
  leave(entry: Element): void {
    this.stop(entry);
  }

  isRunning(entry: Element): boolean {
    return this.stateOf(entry).phase.name !== "idle";
  }

  currentImage(entry: Element): HTMLImageElement | null {
    const index = this.stateOf(entry).currentIndex;
    return index < 0 ? null : thumbnailImages(entry)[index] ?? null;
  }

  private start(entry: Element) {
    const state = this.stateOf(entry);
    if (state.phase.name !== "idle") return;

    const images = thumbnailImages(entry);
    if (!images.length) return;
    const nextIndex = (state.currentIndex + 1) % images.length;
    const next = images[nextIndex];

    const deferred = next.getAttribute(DEFERRED_SOURCE_ATTRIBUTE);
    if (deferred !== null) {
      next.srcset = deferred;
      next.removeAttribute(DEFERRED_SOURCE_ATTRIBUTE);
    }

    if (next.complete) {
      this.advance(entry, images, nextIndex);
      return;
    }
    const listener = () => {
      if (state.phase.name !== "pending-load" || state.phase.image !== next) return;
      state.phase = { name: "idle" };
      this.advance(entry, thumbnailImages(entry), nextIndex);
    };
    next.addEventListener("load", listener, { once: true });
    state.phase = { name: "pending-load", image: next, listener };
  }

  private advance(entry: Element, images: HTMLImageElement[], nextIndex: number) {
    const state = this.stateOf(entry);
    const next = images[nextIndex];
    if (!next) {
      this.stop(entry);
      return;
    }
    clearCurrent(images);
    next.classList.add(CURRENT_CLASS);
    state.currentIndex = nextIndex;

    const timer = window.setTimeout(() => {
      state.phase = { name: "idle" };
      this.start(entry);
    }, this.intervalMs);
    state.phase = { name: "scheduled", timer };
  }

  private stop(entry: Element) {
    const state = this.stateOf(entry);
    const phase = state.phase;
    if (phase.name === "scheduled") {
      window.clearTimeout(phase.timer);
    } else if (phase.name === "pending-load") {
      phase.image.removeEventListener("load", phase.listener);
    }
    state.phase = { name: "idle" };
    state.currentIndex = -1;
    clearCurrent(thumbnailImages(entry));
  }

  private stateOf(entry: Element): EntryState {
    let state = this.states.get(entry);
    if (!state) {
      state = { currentIndex: -1, phase: { name: "idle" } };
      this.states.set(entry, state);
    }
    return state;
  }
}

/**
 * Handle bind hover slideshows.
 * Safe to call again after a partial page swap; entries are bound once.
 */
export function bindHoverSlideshows(root: ParentNode, slideshow: HoverSlideshow): number {
  let bound = 0;
  for (const thumbnails of Array.from(root.querySelectorAll(THUMBNAILS_SELECTOR))) {
    const entry = thumbnails.parentElement;
    if (!entry || boundEntries.has(entry)) continue;
    boundEntries.add(entry);
    entry.addEventListener("mouseenter", () => slideshow.enter(entry));
    entry.addEventListener("mouseleave", () => slideshow.leave(entry));
    bound += 1;
  }
  return bound;
}

function thumbnailImages(entry: Element): HTMLImageElement[] {
  const thumbnails = entry.querySelector(THUMBNAILS_SELECTOR);
  if (!thumbnails) return [];
  return Array.from(thumbnails.querySelectorAll<HTMLImageElement>("img"));
}

function clearCurrent(images: HTMLImageElement[]) {
  for (const image of images) {
    image.classList.remove(CURRENT_CLASS);
  }
}
