import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LiveReloadClient, refreshStylesheets } from "./live-reload";

class FakeSocket extends EventTarget {
  closed = false;

  constructor(readonly url: string) {
    super();
  }

  close() {
    this.closed = true;
  }

  emit(type: "open" | "close") {
    this.dispatchEvent(new Event(type));
  }

  send(data: string) {
    this.dispatchEvent(new MessageEvent("message", { data }));
  }
}

describe("LiveReloadClient", () => {
  let sockets: FakeSocket[];
  let reloadPage: ReturnType<typeof vi.fn>;
  let client: LiveReloadClient;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "info").mockImplementation(() => {});
    document.head.innerHTML = "";
    sockets = [];
    reloadPage = vi.fn();
    client = new LiveReloadClient({
      location: { protocol: "https:", host: "tube.example" },
      createSocket: (url) => {
        const socket = new FakeSocket(url);
        sockets.push(socket);
        return socket;
      },
      reloadPage,
      now: () => 1700000000000,
      retryMs: 500,
    });
  });

  afterEach(() => {
    client.stop();
    vi.useRealTimers();
  });

  it("listens on the reload socket", () => {
    client.start();
    expect(sockets.map((socket) => socket.url)).toEqual(["wss://tube.example/wait_reload"]);
  });

  it("reloads the page on a page message", () => {
    client.start();
    sockets[0].send("page");
    expect(reloadPage).toHaveBeenCalledTimes(1);
  });

  it("refreshes the stylesheet on a style message", () => {
    document.head.innerHTML = `
      <link id="main" rel="stylesheet" href="/style.css">
      <link id="other" rel="stylesheet" href="/static/extra.css">
    `;
    client.start();

    sockets[0].send("style");

    expect(document.getElementById("main")?.getAttribute("href")).toBe(
      "http://localhost:3000/style.css?t=1700000000000"
    );
    expect(document.getElementById("other")?.getAttribute("href")).toBe("/static/extra.css");
    expect(reloadPage).not.toHaveBeenCalled();
  });

  it("ignores unknown messages", () => {
    client.start();
    sockets[0].send("restart");
    expect(reloadPage).not.toHaveBeenCalled();
  });

  it("waits for the server to come back before reloading", () => {
    client.start();
    sockets[0].emit("close");

    expect(sockets[1].url).toBe("wss://tube.example/wait_alive");
    sockets[1].emit("close");
    vi.advanceTimersByTime(500);
    expect(sockets[2].url).toBe("wss://tube.example/wait_alive");

    sockets[2].emit("open");
    expect(sockets[2].closed).toBe(true);
    expect(reloadPage).toHaveBeenCalledTimes(1);
  });

  it("stops polling once stopped", () => {
    client.start();
    sockets[0].emit("close");
    sockets[1].emit("close");

    client.stop();
    vi.advanceTimersByTime(2000);

    expect(sockets).toHaveLength(2);
  });
});

describe("refreshStylesheets", () => {
  it("counts the links it rewrote", () => {
    document.head.innerHTML = `<link rel="stylesheet" href="/style.css?t=1">`;
    expect(refreshStylesheets("/style.css", 5)).toBe(1);
    expect(document.head.querySelector("link")?.getAttribute("href")).toBe(
      "http://localhost:3000/style.css?t=5"
    );
  });
});
