export type SaveState = "save-enabled" | "save-disabled";

/**
 * Session-scoped switch that keeps page changes made while a viewer is
 * activating from being recorded as the reader's own navigation.
 */
export class SaveGuard {
  private current: SaveState = "save-enabled";

  get state(): SaveState {
    return this.current;
  }

  get allowsSave(): boolean {
    return this.current === "save-enabled";
  }

  disable() {
    this.current = "save-disabled";
  }

  enable() {
    this.current = "save-enabled";
  }

  suppress<T>(activation: () => T): T {
    this.disable();
    try {
      return activation();
    } finally {
      this.enable();
    }
  }
}
