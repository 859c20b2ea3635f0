/**
 * Module `client/src/live-reload.ts`: follow the development server's reload sockets.
 */

export type LiveReloadMessage = "page" | "style";

export type SocketLike = EventTarget & { close(): void };

export type SocketFactory = (url: string) => SocketLike;

export interface LiveReloadOptions {
  location?: Pick<Location, "protocol" | "host">;
  createSocket?: SocketFactory;
  reloadPage?: () => void;
  now?: () => number;
  retryMs?: number;
  stylesheetPath?: string;
}

const DEFAULT_RETRY_MS = 500;
const DEFAULT_STYLESHEET_PATH = "/style.css";

/**
 * Represent live reload client behavior.
 */
export class LiveReloadClient {
  private readonly location: Pick<Location, "protocol" | "host">;
  private readonly createSocket: SocketFactory;
  private readonly reloadPage: () => void;
  private readonly now: () => number;
  private readonly retryMs: number;
  private readonly stylesheetPath: string;
  private socket: SocketLike | null = null;
  private retryTimer = 0;
  private stopped = false;

  constructor(options: LiveReloadOptions = {}) {
    this.location = options.location ?? window.location;
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
    this.reloadPage = options.reloadPage ?? (() => window.location.reload());
    this.now = options.now ?? Date.now;
    this.retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
    this.stylesheetPath = options.stylesheetPath ?? DEFAULT_STYLESHEET_PATH;
  }

  start(): void {
    this.stopped = false;
    const socket = this.createSocket(this.socketUrl("/wait_reload"));
    this.socket = socket;
    socket.addEventListener("message", (event) => {
      if (event instanceof MessageEvent && isLiveReloadMessage(event.data)) {
        this.handle(event.data);
      }
    });
    socket.addEventListener("close", () => {
      if (this.socket !== socket || this.stopped) return;
      console.info("[live-reload] server went away, waiting for it to come back");
      this.waitAlive();
    });
  }

  stop(): void {
    this.stopped = true;
    window.clearTimeout(this.retryTimer);
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  handle(message: LiveReloadMessage): void {
    if (message === "page") {
      this.reloadPage();
      return;
    }
    const refreshed = refreshStylesheets(this.stylesheetPath, this.now());
    console.info(`[live-reload] refreshed ${refreshed} stylesheet(s)`);
  }

  private waitAlive() {
    if (this.stopped) return;
    const socket = this.createSocket(this.socketUrl("/wait_alive"));
    this.socket = socket;
    let opened = false;
    socket.addEventListener("open", () => {
      opened = true;
      socket.close();
      this.reloadPage();
    });
    socket.addEventListener("close", () => {
      if (opened || this.socket !== socket || this.stopped) return;
      this.retryTimer = window.setTimeout(() => this.waitAlive(), this.retryMs);
    });
  }

  private socketUrl(path: string) {
    const scheme = this.location.protocol === "https:" ? "wss:" : "ws:";
    return `${scheme}//${this.location.host}${path}`;
  }
}

/**
 * Handle refresh stylesheets.
 */
export function refreshStylesheets(path: string, stamp: number, root: ParentNode = document): number {
  let count = 0;
  for (const link of Array.from(root.querySelectorAll<HTMLLinkElement>('link[rel="stylesheet"]'))) {
    const url = new URL(link.href, document.baseURI);
    if (url.pathname !== path) continue;
    url.searchParams.set("t", String(stamp));
    link.href = url.toString();
    count += 1;
  }
  return count;
}

function isLiveReloadMessage(value: unknown): value is LiveReloadMessage {
  return value === "page" || value === "style";
}
