import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventBus } from "@core-platform";
import { MemoryPageBackend, PageStore } from "@page-store";
import { PageMemoryController, setupPageMemory } from "@viewer-session";
import type { ViewerEvents, ViewerHost } from "@viewer-session";

class FakeHost implements ViewerHost {
  readonly bus = new EventBus<ViewerEvents>();
  page = 1;
  viewerMode = true;
  readonly visited: number[] = [];

  on = this.bus.on.bind(this.bus);
  off = this.bus.off.bind(this.bus);

  currentPage() {
    return this.page;
  }

  gotoPage(page: number) {
    this.page = page;
    this.visited.push(page);
  }

  isViewerMode() {
    return this.viewerMode;
  }
}

const DOC = "/books/report.pdf";

describe("PageMemoryController", () => {
  let host: FakeHost;
  let backend: MemoryPageBackend;
  let store: PageStore;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    host = new FakeHost();
    backend = new MemoryPageBackend();
    store = new PageStore({ backend });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("suppresses saves during activation and saves once it completes", () => {
    const controller = setupPageMemory(host, { store });

    host.bus.emit("activation:before", { documentPath: DOC });
    expect(controller.guard.state).toBe("save-disabled");

    host.bus.emit("mode:entered", { documentPath: DOC });
    host.page = 1;
    host.bus.emit("page:changed", { documentPath: DOC, page: 1 });
    expect(backend.writes).toBe(0);

    host.bus.emit("activation:after", { documentPath: DOC });
    expect(controller.guard.state).toBe("save-enabled");

    host.page = 5;
    host.bus.emit("page:changed", { documentPath: DOC, page: 5 });
    expect(backend.writes).toBe(1);
    expect(store.getPage("report")).toBe(5);
  });

  it("navigates to the stored page when the mode is entered", () => {
    store.setPage("report", 12);
    const restored: Array<{ key: string; page: number }> = [];
    const controller = setupPageMemory(host, { store });
    controller.on("page:restored", payload => restored.push(payload));

    host.bus.emit("mode:entered", { documentPath: DOC });

    expect(host.visited).toEqual([12]);
    expect(restored).toEqual([{ key: "report", page: 12 }]);
  });

  it("leaves the page alone when nothing is stored", () => {
    setupPageMemory(host, { store });

    host.bus.emit("mode:entered", { documentPath: DOC });

    expect(host.visited).toEqual([]);
  });

  it("does nothing outside viewer mode", () => {
    store.setPage("report", 12);
    const controller = setupPageMemory(host, { store });
    host.viewerMode = false;

    host.bus.emit("mode:entered", { documentPath: DOC });
    host.page = 3;

    expect(host.visited).toEqual([]);
    expect(controller.save(DOC)).toBe(false);
    expect(store.getPage("report")).toBe(12);
  });

  it("reports suppressed saves", () => {
    const controller = setupPageMemory(host, { store });
    const suppressed: string[] = [];
    controller.on("save:suppressed", ({ documentPath }) => suppressed.push(documentPath));

    controller.guard.suppress(() => {
      host.bus.emit("page:changed", { documentPath: DOC, page: 1 });
    });

    expect(suppressed).toEqual([DOC]);
    expect(backend.writes).toBe(0);
  });

  it("keeps host errors away from the host", () => {
    setupPageMemory(host, { store });
    host.currentPage = () => {
      throw new Error("viewer gone");
    };

    expect(() => host.bus.emit("page:changed", { documentPath: DOC, page: 2 })).not.toThrow();
    expect(console.warn).toHaveBeenCalledWith(
      "[viewer-session] Failed to save page for /books/report.pdf: viewer gone",
    );
  });

  it("registers each hook once and removes them on dispose", () => {
    const controller = new PageMemoryController(host, { store });
    controller.attach();
    controller.attach();

    expect(host.bus.listenerCount("activation:before")).toBe(1);
    expect(host.bus.listenerCount("activation:after")).toBe(1);
    expect(host.bus.listenerCount("mode:entered")).toBe(1);
    expect(host.bus.listenerCount("page:changed")).toBe(1);

    controller.dispose();

    expect(host.bus.listenerCount("activation:before")).toBe(0);
    expect(host.bus.listenerCount("activation:after")).toBe(0);
    expect(host.bus.listenerCount("mode:entered")).toBe(0);
    expect(host.bus.listenerCount("page:changed")).toBe(0);
  });
});
