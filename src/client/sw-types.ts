/**
 * Narrow views of the browser's service worker, registration and push
 * objects. `navigator.serviceWorker` satisfies them; tests supply fakes.
 */
import type { BridgeContainer, WorkerHandle } from "./worker-bridge.js";

export interface WorkerLike extends WorkerHandle {
  readonly state: string;
  addEventListener(type: "statechange", listener: () => void): void;
}

export interface SyncManagerLike {
  register(tag: string): Promise<void>;
}

export interface PushSubscriptionLike {
  readonly endpoint: string;
}

export interface PushSubscribeOptions {
  userVisibleOnly: boolean;
  applicationServerKey: BufferSource;
}

export interface PushManagerLike {
  getSubscription(): Promise<PushSubscriptionLike | null>;
  subscribe(options: PushSubscribeOptions): Promise<PushSubscriptionLike>;
}

export interface RegistrationLike {
  readonly scope: string;
  readonly installing: WorkerLike | null;
  readonly waiting: WorkerLike | null;
  readonly active: WorkerLike | null;
  /** Absent in browsers without Background Sync. */
  readonly sync?: SyncManagerLike;
  readonly pushManager?: PushManagerLike;
  update(): Promise<unknown>;
  addEventListener(type: "updatefound", listener: () => void): void;
}

export interface WorkerContainerLike extends BridgeContainer {
  readonly controller: WorkerLike | null;
  addEventListener(type: "message", listener: (event: MessageEvent) => void): void;
  addEventListener(type: "controllerchange", listener: () => void): void;
  readonly ready: Promise<RegistrationLike>;
  register(scriptUrl: string, options: { scope: string }): Promise<RegistrationLike>;
}
