/**
 * Structural view of the service worker global scope.
 *
 * The page bundle compiles against the DOM library, which has no
 * ServiceWorkerGlobalScope, so the worker declares only the surface it uses.
 * The browser's `self`, `caches` and event objects satisfy these shapes.
 */

export type CacheKey = Request | string;

export interface CacheLike {
  match(request: CacheKey): Promise<Response | undefined>;
  put(request: CacheKey, response: Response): Promise<void>;
}

export interface CacheStorageLike {
  open(name: string): Promise<CacheLike>;
  has(name: string): Promise<boolean>;
  delete(name: string): Promise<boolean>;
  keys(): Promise<string[]>;
  match(request: CacheKey): Promise<Response | undefined>;
}

export interface ExtendableEventLike {
  waitUntil(promise: Promise<unknown>): void;
}

export interface FetchEventLike extends ExtendableEventLike {
  readonly request: Request;
  respondWith(response: Promise<Response>): void;
}

export interface SyncEventLike extends ExtendableEventLike {
  readonly tag: string;
}

export interface PushMessageDataLike {
  text(): string;
}

export interface PushEventLike extends ExtendableEventLike {
  readonly data: PushMessageDataLike | null;
}

export interface NotificationLike {
  close(): void;
}

export interface NotificationEventLike extends ExtendableEventLike {
  readonly notification: NotificationLike;
}

export interface MessagePortLike {
  postMessage(message: unknown): void;
}

export interface MessageEventLike extends ExtendableEventLike {
  readonly data: unknown;
  readonly ports: readonly MessagePortLike[];
}

export interface WindowClientLike {
  readonly url: string;
  focus(): Promise<unknown>;
  postMessage(message: unknown): void;
}

export interface ClientsLike {
  claim(): Promise<void>;
  matchAll(options: { type: "window"; includeUncontrolled: boolean }): Promise<readonly WindowClientLike[]>;
  openWindow(url: string): Promise<unknown>;
}

/** Options accepted by `registration.showNotification`. */
export interface NotificationDisplayOptions {
  body: string;
  icon: string;
  badge: string;
  vibrate: number[];
  tag: string;
  requireInteraction: boolean;
}

export interface WorkerRegistrationLike {
  showNotification(title: string, options: NotificationDisplayOptions): Promise<void>;
}

export interface WorkerEventMap {
  install: ExtendableEventLike;
  activate: ExtendableEventLike;
  fetch: FetchEventLike;
  sync: SyncEventLike;
  push: PushEventLike;
  notificationclick: NotificationEventLike;
  message: MessageEventLike;
}

export interface WorkerScope {
  readonly location: { readonly origin: string };
  readonly caches: CacheStorageLike;
  readonly clients: ClientsLike;
  readonly registration: WorkerRegistrationLike;
  fetch(request: Request): Promise<Response>;
  skipWaiting(): Promise<void>;
  addEventListener<K extends keyof WorkerEventMap>(
    type: K,
    listener: (event: WorkerEventMap[K]) => void,
  ): void;
}
