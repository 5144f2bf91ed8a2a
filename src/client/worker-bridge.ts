import {
  createWorkerCommand,
  parseWorkerEvent,
  WORKER_COMMANDS,
  type WorkerCommandType,
  type WorkerEvent,
} from "../shared/worker-protocol.js";

const REQUEST_TIMEOUT_MS = 10_000;

/** The parts of a ServiceWorker the page talks to. */
export interface WorkerHandle {
  postMessage(message: unknown, transfer: MessagePort[]): void;
}

export interface BridgeContainer {
  readonly controller: WorkerHandle | null;
  addEventListener(type: "message", listener: (event: MessageEvent) => void): void;
}

export interface WorkerBridgeOptions {
  timeoutMs?: number;
}

/**
 * Page side of the worker control protocol. Commands are fire-and-forget
 * unless sent with `request`, which waits for a reply on a private channel.
 */
export class WorkerBridge {
  private readonly listeners = new Set<(event: WorkerEvent) => void>();
  private readonly timeoutMs: number;

  constructor(
    private readonly container: BridgeContainer,
    options: WorkerBridgeOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    container.addEventListener("message", (event) => this.handleMessage(event.data));
  }

  get hasController(): boolean {
    return this.container.controller !== null;
  }

  /** Register a listener for unsolicited worker events. Returns an unsubscribe function. */
  onEvent(listener: (event: WorkerEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  send(type: WorkerCommandType, worker: WorkerHandle | null = this.container.controller): boolean {
    if (!worker) {
      return false;
    }
    worker.postMessage(createWorkerCommand(type), []);
    return true;
  }

  request(
    type: WorkerCommandType,
    worker: WorkerHandle | null = this.container.controller,
  ): Promise<WorkerEvent> {
    if (!worker) {
      return Promise.reject(new Error("No service worker controls this page"));
    }

    const channel = new MessageChannel();
    return new Promise<WorkerEvent>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        channel.port1.close();
        reject(new Error(`Worker request "${type}" timed out`));
      }, this.timeoutMs);

      channel.port1.onmessage = (event: MessageEvent) => {
        clearTimeout(timeoutId);
        channel.port1.close();
        const reply = parseWorkerEvent(event.data);
        if (reply) {
          resolve(reply);
        } else {
          reject(new Error(`Unexpected reply to "${type}"`));
        }
      };

      try {
        worker.postMessage(createWorkerCommand(type), [channel.port2]);
      } catch (err) {
        clearTimeout(timeoutId);
        channel.port1.close();
        reject(err);
      }
    });
  }

  /** Delete every cache partition. Resolves with the deleted names, or null without a controller. */
  async clearCaches(): Promise<string[] | null> {
    if (!this.hasController) {
      return null;
    }
    const reply = await this.request(WORKER_COMMANDS.CLEAR_CACHE);
    return reply.type === "CACHES_CLEARED" ? reply.partitions : [];
  }

  private handleMessage(data: unknown): void {
    const event = parseWorkerEvent(data);
    if (!event) {
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("Error in worker event listener:", err);
      }
    }
  }
}
