import type { EventHandler } from "@core-platform";

export type ViewerEvents = {
  "activation:before": { documentPath: string };
  "activation:after": { documentPath: string };
  "mode:entered": { documentPath: string };
  "page:changed": { documentPath: string; page: number };
};

/**
 * What page memory needs from the document viewer. Hosts must fire
 * `activation:before`, then any navigation of their own plus `mode:entered`,
 * then `activation:after`.
 */
export interface ViewerHost {
  currentPage(): number;
  gotoPage(page: number): void;
  isViewerMode(): boolean;
  on<EventKey extends keyof ViewerEvents>(event: EventKey, handler: EventHandler<ViewerEvents[EventKey]>): void;
  off<EventKey extends keyof ViewerEvents>(event: EventKey, handler: EventHandler<ViewerEvents[EventKey]>): void;
}
