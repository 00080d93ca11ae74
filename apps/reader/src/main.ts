import { EventBus } from "@core-platform";
import { setupPageMemory } from "@viewer-session";
import type { PageMemoryOptions, ViewerEvents, ViewerHost } from "@viewer-session";

export interface OpenDocumentOptions {
  pageCount?: number;
  /** Page the viewer lands on before any saved page is restored. */
  defaultPage?: number;
}

/**
 * In-process viewer that follows the host lifecycle: each `open` runs
 * activation:before, its own initial navigation, mode:entered, then
 * activation:after.
 */
export class ScriptedViewer implements ViewerHost {
  private readonly events = new EventBus<ViewerEvents>();
  private page = 1;
  private pageCount = 1;
  private documentPath?: string;

  on = this.events.on.bind(this.events);
  off = this.events.off.bind(this.events);

  get openDocument(): string | undefined {
    return this.documentPath;
  }

  currentPage() {
    return this.page;
  }

  isViewerMode() {
    return this.documentPath !== undefined;
  }

  gotoPage(page: number) {
    if (!this.documentPath) return;
    const target = Math.min(Math.max(Math.trunc(page), 1), this.pageCount);
    if (target === this.page) return;
    this.page = target;
    this.events.emit("page:changed", { documentPath: this.documentPath, page: target });
  }

  open(documentPath: string, options: OpenDocumentOptions = {}) {
    this.events.emit("activation:before", { documentPath });

    this.documentPath = documentPath;
    this.pageCount = Math.max(options.pageCount ?? 100, 1);
    this.page = 0;
    this.gotoPage(options.defaultPage ?? 1);
    this.events.emit("mode:entered", { documentPath });

    this.events.emit("activation:after", { documentPath });
  }

  close() {
    this.documentPath = undefined;
    this.page = 1;
  }
}

export function bootstrapReader(options: PageMemoryOptions = {}) {
  const viewer = new ScriptedViewer();
  const memory = setupPageMemory(viewer, options);

  return {
    viewer,
    memory,
  };
}
