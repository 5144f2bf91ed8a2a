import createDebug from "debug";

const log = createDebug("offline-shell:install-prompt");

export type InstallOutcome = "accepted" | "dismissed";

/** The browser's `beforeinstallprompt` event (non-standard, Chromium only). */
export interface InstallPromptEvent {
  preventDefault(): void;
  prompt(): Promise<void>;
  readonly userChoice: Promise<{ outcome: InstallOutcome }>;
}

export function isInstallPromptEvent(event: Event): event is Event & InstallPromptEvent {
  return "prompt" in event && typeof event.prompt === "function" && "userChoice" in event;
}

export type InstallPromptState = "idle" | "captured" | "shown" | "consumed";

/**
 * Single owner of the deferred install offer.
 *
 * captured → shown → (accepted | dismissed) → consumed. A new capture replaces
 * the pending handle, and the replaced one is never prompted.
 */
export class InstallPromptController {
  private handle: InstallPromptEvent | null = null;
  private state: InstallPromptState = "idle";
  private outcome: InstallOutcome | null = null;
  private readonly listeners = new Set<(available: boolean) => void>();

  get promptState(): InstallPromptState {
    return this.state;
  }

  /** Whether an install control should be offered. */
  get available(): boolean {
    return this.handle !== null;
  }

  get lastOutcome(): InstallOutcome | null {
    return this.outcome;
  }

  onChange(listener: (available: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  capture(event: InstallPromptEvent): void {
    event.preventDefault();
    if (this.handle) {
      log("replacing pending install prompt");
    }
    this.handle = event;
    this.state = "captured";
    this.notify();
  }

  /**
   * Show the native prompt for the newest captured offer and wait for the
   * user's choice. The handle is discarded whatever the outcome.
   * Resolves null when nothing is pending.
   */
  async trigger(): Promise<InstallOutcome | null> {
    const handle = this.handle;
    if (!handle) {
      return null;
    }

    this.handle = null;
    this.state = "shown";
    this.notify();

    try {
      await handle.prompt();
      const { outcome } = await handle.userChoice;
      log("user response: %s", outcome);
      this.outcome = outcome;
      return outcome;
    } finally {
      // A capture that arrived while the prompt was open keeps its own state.
      if (this.handle === null) {
        this.state = "consumed";
      }
    }
  }

  /** The app was installed through any route; drop whatever is pending. */
  markInstalled(): void {
    this.handle = null;
    this.state = "consumed";
    this.notify();
  }

  private notify(): void {
    const available = this.available;
    for (const listener of this.listeners) {
      try {
        listener(available);
      } catch (err) {
        console.error("Error in install prompt listener:", err);
      }
    }
  }
}
