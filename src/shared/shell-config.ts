// ─── Shell Configuration ──────────────────────────────────────────────

export type PartitionKind = "static" | "dynamic";

/** Presentation of push notifications shown by the worker. */
export interface NotificationPresentation {
  title: string;
  defaultBody: string;
  icon: string;
  badge: string;
  vibrate: readonly number[];
  tag: string;
}

export interface ShellConfig {
  /** Version token embedded in the static partition name. */
  staticVersion: string;
  /** Version token embedded in the dynamic partition name. */
  dynamicVersion: string;
  /** Ordered, absolute resource paths fetched at install time. */
  precache: readonly string[];
  /** Served as the offline placeholder for HTML requests. Must be precached. */
  rootDocument: string;
  bypassPrefixes: readonly string[];
  staticPrefixes: readonly string[];
  assetExtensions: readonly string[];
  syncTag: string;
  scope: string;
  workerScript: string;
  updateIntervalMs: number;
  notification: NotificationPresentation;
  /** Base64url VAPID key; push subscription is skipped without it. */
  pushPublicKey?: string;
}

export const SYNC_TASKS_TAG = "sync-tasks";

export const DEFAULT_SHELL_CONFIG: ShellConfig = {
  staticVersion: "v1",
  dynamicVersion: "v1",
  precache: [
    "/",
    "/static/css/output.css",
    "/static/js/htmx.min.js",
    "/static/js/alpine.min.js",
    "/static/manifest.json",
    "/static/icons/icon-192x192.png",
    "/static/icons/icon-512x512.png",
    "/users/login/",
  ],
  rootDocument: "/",
  bypassPrefixes: ["/admin/", "/api/"],
  staticPrefixes: ["/static/", "/media/"],
  assetExtensions: ["css", "js", "png", "jpg", "jpeg", "svg", "gif", "woff", "woff2", "ttf", "eot"],
  syncTag: SYNC_TASKS_TAG,
  scope: "/",
  workerScript: "/static/sw.js",
  updateIntervalMs: 60 * 60 * 1000,
  notification: {
    title: "Task Manager",
    defaultBody: "New notification",
    icon: "/static/icons/icon-192x192.png",
    badge: "/static/icons/icon-96x96.png",
    vibrate: [200, 100, 200],
    tag: "task-notification",
  },
};

export class ShellConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShellConfigError";
  }
}

/** Name of the cache partition for a kind at a version, e.g. `static-v1`. */
export function partitionName(kind: PartitionKind, version: string): string {
  return `${kind}-${version}`;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ShellConfigError when the offline fallback could not work.
 */
export function defineShellConfig(overrides: Partial<ShellConfig> = {}): ShellConfig {
  const config: ShellConfig = {
    ...DEFAULT_SHELL_CONFIG,
    ...overrides,
    notification: {
      ...DEFAULT_SHELL_CONFIG.notification,
      ...overrides.notification,
    },
  };
  validateShellConfig(config);
  return config;
}

export function validateShellConfig(config: ShellConfig): void {
  if (!config.staticVersion.trim() || !config.dynamicVersion.trim()) {
    throw new ShellConfigError("Partition version tokens must not be empty");
  }
  if (!config.precache.includes(config.rootDocument)) {
    throw new ShellConfigError(
      `Root document "${config.rootDocument}" must be in the precache manifest`,
    );
  }
  const relative = config.precache.find((entry) => !entry.startsWith("/"));
  if (relative !== undefined) {
    throw new ShellConfigError(`Precache entry "${relative}" is not an absolute path`);
  }
  if (!(config.updateIntervalMs > 0)) {
    throw new ShellConfigError("Update interval must be a positive number of milliseconds");
  }
}
