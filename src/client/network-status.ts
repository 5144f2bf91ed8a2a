import createDebug from "debug";
import type { RegistrationLike } from "./sw-types.js";
import type { ToastKind } from "./ui/toasts.js";

const log = createDebug("offline-shell:network");

export const OFFLINE_MESSAGE = "No internet connection. Working in offline mode.";

export interface NetworkStatusOptions {
  target: Pick<EventTarget, "addEventListener" | "removeEventListener">;
  /** Resolves once a worker is active, like `navigator.serviceWorker.ready`. */
  ready: () => Promise<RegistrationLike>;
  syncTag: string;
  notify: (message: string, kind: ToastKind) => void;
}

/** Requests a background sync when connectivity returns and warns when it is lost. */
export class NetworkStatusObserver {
  private started = false;

  constructor(private readonly options: NetworkStatusOptions) {}

  start(): void {
    if (this.started) return;
    this.started = true;
    this.options.target.addEventListener("online", this.handleOnline);
    this.options.target.addEventListener("offline", this.handleOffline);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.options.target.removeEventListener("online", this.handleOnline);
    this.options.target.removeEventListener("offline", this.handleOffline);
  }

  /** Returns false when the browser has no Background Sync or registration failed. */
  async requestSync(): Promise<boolean> {
    try {
      const registration = await this.options.ready();
      if (!registration.sync) {
        log("background sync not supported");
        return false;
      }
      await registration.sync.register(this.options.syncTag);
      log("registered sync %s", this.options.syncTag);
      return true;
    } catch (err) {
      console.warn("Background sync registration failed:", err);
      return false;
    }
  }

  private readonly handleOnline = (): void => {
    log("back online");
    void this.requestSync();
  };

  private readonly handleOffline = (): void => {
    log("gone offline");
    this.options.notify(OFFLINE_MESSAGE, "warning");
  };
}
