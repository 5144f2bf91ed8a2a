import createDebug from "debug";
import type { ShellConfig } from "../shared/shell-config.js";
import {
  WORKER_COMMANDS,
  parseWorkerCommand,
  type WorkerCommand,
  type WorkerEvent,
} from "../shared/worker-protocol.js";
import { CacheStore } from "./cache-store.js";
import { createRoutes, resolveRoute, type Route } from "./routes.js";
import type {
  MessagePortLike,
  NotificationLike,
  PushMessageDataLike,
  WorkerScope,
} from "./host.js";

const log = {
  worker: createDebug("offline-shell:worker"),
  sync: createDebug("offline-shell:sync"),
  push: createDebug("offline-shell:push"),
};

export type SyncHandler = (tag: string) => Promise<void>;

export interface InterceptionWorkerOptions {
  /** Handlers keyed by background-sync tag. Defaults to a client notifier for the configured tag. */
  syncHandlers?: ReadonlyMap<string, SyncHandler>;
}

/**
 * Background request router and lifecycle owner. Each handler returns the
 * promise the host must wait on; `attach` wires them to the worker events.
 */
export class InterceptionWorker {
  readonly store: CacheStore;
  private readonly routes: Route[];
  private readonly syncHandlers: ReadonlyMap<string, SyncHandler>;

  constructor(
    private readonly scope: WorkerScope,
    private readonly config: ShellConfig,
    options: InterceptionWorkerOptions = {},
  ) {
    this.store = new CacheStore(scope.caches, config, scope.location.origin);
    this.routes = createRoutes(config);
    this.syncHandlers =
      options.syncHandlers ?? new Map([[config.syncTag, (tag: string) => this.notifyClientsToSync(tag)]]);
  }

  attach(): void {
    this.scope.addEventListener("install", (event) => {
      event.waitUntil(this.install());
    });
    this.scope.addEventListener("activate", (event) => {
      event.waitUntil(this.activate());
    });
    this.scope.addEventListener("fetch", (event) => {
      const response = this.handleFetch(event.request, (work) => event.waitUntil(work));
      if (response) {
        event.respondWith(response);
      }
    });
    this.scope.addEventListener("sync", (event) => {
      event.waitUntil(this.sync(event.tag));
    });
    this.scope.addEventListener("push", (event) => {
      event.waitUntil(this.push(event.data));
    });
    this.scope.addEventListener("notificationclick", (event) => {
      event.waitUntil(this.notificationClick(event.notification));
    });
    this.scope.addEventListener("message", (event) => {
      event.waitUntil(this.message(event.data, event.ports));
    });
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  async install(): Promise<void> {
    log.worker("installing %s", this.store.nameOf("static"));
    await this.store.precache(this.config.precache, (request) => this.scope.fetch(request));
    await this.scope.skipWaiting();
  }

  async activate(): Promise<void> {
    log.worker("activating");
    await this.store.purgeStale();
    await this.scope.clients.claim();
  }

  // ─── Requests ─────────────────────────────────────────────────────

  /**
   * Route a request. Returns null when the request bypasses the worker, in
   * which case the caller must not respond to the event.
   */
  handleFetch(request: Request, waitUntil: (work: Promise<unknown>) => void): Promise<Response> | null {
    const route = resolveRoute(this.routes, request);
    if (!route.strategy) {
      return null;
    }
    return route.strategy({
      request,
      store: this.store,
      network: (req) => this.scope.fetch(req),
      rootDocument: this.config.rootDocument,
      waitUntil,
    });
  }

  // ─── Background sync ──────────────────────────────────────────────

  async sync(tag: string): Promise<void> {
    const handler = this.syncHandlers.get(tag);
    if (!handler) {
      log.sync("ignoring unknown sync tag %s", tag);
      return;
    }
    log.sync("running %s", tag);
    await handler(tag);
  }

  /** Ask every open page to flush its pending task writes; the page owns the queue. */
  private async notifyClientsToSync(tag: string): Promise<void> {
    const clients = await this.scope.clients.matchAll({ type: "window", includeUncontrolled: true });
    const event: WorkerEvent = { type: "SYNC_REQUESTED", tag };
    for (const client of clients) {
      client.postMessage(event);
    }
    log.sync("notified %d clients", clients.length);
  }

  // ─── Push & notifications ─────────────────────────────────────────

  async push(data: PushMessageDataLike | null): Promise<void> {
    const { notification } = this.config;
    const body = data ? data.text() : notification.defaultBody;
    try {
      await this.scope.registration.showNotification(notification.title, {
        body,
        icon: notification.icon,
        badge: notification.badge,
        vibrate: [...notification.vibrate],
        tag: notification.tag,
        requireInteraction: false,
      });
      log.push("displayed notification");
    } catch (error) {
      console.error("Failed to display push notification:", error);
    }
  }

  async notificationClick(notification: NotificationLike): Promise<void> {
    notification.close();

    const root = new URL(this.config.rootDocument, this.scope.location.origin);
    const clients = await this.scope.clients.matchAll({ type: "window", includeUncontrolled: true });
    const existing = clients.find((client) => {
      const url = new URL(client.url);
      return url.origin === root.origin && url.pathname === root.pathname;
    });
    if (existing) {
      await existing.focus();
      return;
    }
    await this.scope.clients.openWindow(root.pathname);
  }

  // ─── Control messages ─────────────────────────────────────────────

  async message(data: unknown, ports: readonly MessagePortLike[] = []): Promise<void> {
    const command = parseWorkerCommand(data);
    if (!command) {
      return;
    }

    const reply = await this.runCommand(command);
    for (const port of ports) {
      port.postMessage(reply);
    }
  }

  private async runCommand(command: WorkerCommand): Promise<WorkerEvent> {
    switch (command.type) {
      case WORKER_COMMANDS.SKIP_WAITING:
        log.worker("skip waiting requested");
        await this.scope.skipWaiting();
        return { type: "SKIP_WAITING_DONE" };
      case WORKER_COMMANDS.CLEAR_CACHE:
        return { type: "CACHES_CLEARED", partitions: await this.store.clear() };
    }
  }
}
