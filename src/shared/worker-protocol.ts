// ─── Page → Worker Commands ───────────────────────────────────────────

export const WORKER_COMMANDS = {
  SKIP_WAITING: "SKIP_WAITING",
  CLEAR_CACHE: "CLEAR_CACHE",
} as const;

export type WorkerCommandType = (typeof WORKER_COMMANDS)[keyof typeof WORKER_COMMANDS];

export interface WorkerCommand {
  type: WorkerCommandType;
}

// ─── Worker → Page Events ─────────────────────────────────────────────

export interface CachesClearedEvent {
  type: "CACHES_CLEARED";
  partitions: string[];
}

export interface SkipWaitingDoneEvent {
  type: "SKIP_WAITING_DONE";
}

export interface SyncRequestedEvent {
  type: "SYNC_REQUESTED";
  tag: string;
}

export type WorkerEvent = CachesClearedEvent | SkipWaitingDoneEvent | SyncRequestedEvent;

// ─── Helpers ──────────────────────────────────────────────────────────

export function createWorkerCommand(type: WorkerCommandType): WorkerCommand {
  return { type };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isCommandType(value: unknown): value is WorkerCommandType {
  return value === WORKER_COMMANDS.SKIP_WAITING || value === WORKER_COMMANDS.CLEAR_CACHE;
}

/** Returns null for anything that is not a recognized command. */
export function parseWorkerCommand(data: unknown): WorkerCommand | null {
  if (!isRecord(data) || !isCommandType(data.type)) {
    return null;
  }
  return { type: data.type };
}

/** Narrows a message received from the worker. Returns null for unknown shapes. */
export function parseWorkerEvent(data: unknown): WorkerEvent | null {
  if (!isRecord(data)) {
    return null;
  }
  switch (data.type) {
    case "CACHES_CLEARED":
      return Array.isArray(data.partitions)
        ? {
            type: "CACHES_CLEARED",
            partitions: data.partitions.filter((p): p is string => typeof p === "string"),
          }
        : null;
    case "SKIP_WAITING_DONE":
      return { type: "SKIP_WAITING_DONE" };
    case "SYNC_REQUESTED":
      return typeof data.tag === "string" ? { type: "SYNC_REQUESTED", tag: data.tag } : null;
    default:
      return null;
  }
}
