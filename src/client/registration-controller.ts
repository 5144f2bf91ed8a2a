import createDebug from "debug";
import type { ShellConfig } from "../shared/shell-config.js";
import { WORKER_COMMANDS } from "../shared/worker-protocol.js";
import type { RegistrationLike, WorkerContainerLike, WorkerLike } from "./sw-types.js";
import type { WorkerBridge } from "./worker-bridge.js";

const log = createDebug("offline-shell:client");

export type UpdateState = "none" | "installing" | "installed-waiting" | "active";

export interface RegistrationControllerOptions {
  container: WorkerContainerLike;
  bridge: WorkerBridge;
  config: Pick<ShellConfig, "workerScript" | "scope" | "updateIntervalMs">;
  /** Ask the user whether to switch to the new version now. */
  confirmUpdate: () => boolean | Promise<boolean>;
  reload: () => void;
  onStateChange?: (state: UpdateState) => void;
  onError?: (error: Error) => void;
}

export class RegistrationController {
  private state: UpdateState = "none";
  private registration: RegistrationLike | null = null;
  private pollTimer?: ReturnType<typeof setInterval>;
  private reloadOnControllerChange = false;
  private listeningForController = false;

  constructor(private readonly options: RegistrationControllerOptions) {}

  get updateState(): UpdateState {
    return this.state;
  }

  get currentRegistration(): RegistrationLike | null {
    return this.registration;
  }

  /**
   * Register the worker at the root scope, check for an update once it is
   * ready and keep polling. Resolves null when registration fails.
   */
  async start(): Promise<RegistrationLike | null> {
    const { container, config } = this.options;
    let registration: RegistrationLike;
    try {
      registration = await container.register(config.workerScript, { scope: config.scope });
    } catch (err) {
      console.error("Service worker registration failed:", err);
      this.handleError(err instanceof Error ? err : new Error(String(err)));
      return null;
    }

    log("registered with scope %s", registration.scope);
    this.registration = registration;
    if (registration.active) {
      this.setState("active");
    }

    this.listenForControllerChange();
    registration.addEventListener("updatefound", () => {
      this.trackInstalling(registration.installing);
    });

    this.clearPollTimer();
    this.pollTimer = setInterval(() => {
      void this.checkForUpdates();
    }, config.updateIntervalMs);

    void this.checkForUpdates();
    return registration;
  }

  /** Ask the host to re-fetch the worker script. Failures (e.g. offline) are logged. */
  async checkForUpdates(): Promise<void> {
    try {
      const registration = await this.options.container.ready;
      await registration.update();
      log("update check complete");
    } catch (err) {
      console.warn("Service worker update check failed:", err);
    }
  }

  dispose(): void {
    this.clearPollTimer();
  }

  private trackInstalling(worker: WorkerLike | null): void {
    if (!worker) {
      return;
    }
    this.setState("installing");

    worker.addEventListener("statechange", () => {
      if (worker.state === "installed") {
        this.setState("installed-waiting");
        // Only an upgrade has an existing controller; a first install does not.
        if (this.options.container.controller) {
          void this.promptForUpdate(worker);
        }
      } else if (worker.state === "activated") {
        this.setState("active");
      } else if (worker.state === "redundant") {
        // Install failed or was superseded; whatever was in control still is.
        log("installing worker became redundant");
        this.setState(this.registration?.active ? "active" : "none");
      }
    });
  }

  private async promptForUpdate(worker: WorkerLike): Promise<void> {
    let accepted: boolean;
    try {
      accepted = await this.options.confirmUpdate();
    } catch (err) {
      console.error("Error in confirmUpdate callback:", err);
      return;
    }

    if (!accepted) {
      log("update declined, keeping current version");
      return;
    }
    // Reload only once the new worker has taken control of this page.
    this.reloadOnControllerChange = true;
    this.options.bridge.send(WORKER_COMMANDS.SKIP_WAITING, worker);
  }

  private listenForControllerChange(): void {
    if (this.listeningForController) {
      return;
    }
    this.listeningForController = true;
    this.options.container.addEventListener("controllerchange", () => {
      if (!this.reloadOnControllerChange) {
        return;
      }
      this.reloadOnControllerChange = false;
      log("new worker in control, reloading");
      this.options.reload();
    });
  }

  private setState(state: UpdateState): void {
    if (this.state === state) {
      return;
    }
    this.state = state;
    try {
      this.options.onStateChange?.(state);
    } catch (err) {
      console.error("Error in onStateChange callback:", err);
    }
  }

  private handleError(error: Error): void {
    try {
      this.options.onError?.(error);
    } catch (err) {
      console.error("Error in onError callback:", err);
    }
  }

  private clearPollTimer(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  }
}
