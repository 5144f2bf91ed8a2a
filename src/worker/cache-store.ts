import createDebug from "debug";
import { partitionName, type PartitionKind } from "../shared/shell-config.js";
import type { CacheKey, CacheStorageLike } from "./host.js";

const log = {
  cache: createDebug("offline-shell:cache"),
  install: createDebug("offline-shell:install"),
};

export interface PartitionVersions {
  staticVersion: string;
  dynamicVersion: string;
}

/** Raised when a manifest resource cannot be fetched at install time. */
export class PrecacheError extends Error {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Failed to precache ${url}: ${reason}`);
    this.name = "PrecacheError";
  }
}

/**
 * Owns every cache partition of the worker. Partition names carry their
 * version token, so anything not named after the current versions is stale.
 */
export class CacheStore {
  constructor(
    private readonly storage: CacheStorageLike,
    private readonly versions: PartitionVersions,
    private readonly origin: string,
  ) {}

  nameOf(kind: PartitionKind): string {
    return partitionName(
      kind,
      kind === "static" ? this.versions.staticVersion : this.versions.dynamicVersion,
    );
  }

  /** Resolve a path against the worker origin so keys never depend on a base URL. */
  toRequest(input: CacheKey): Request {
    return typeof input === "string" ? new Request(new URL(input, this.origin)) : input;
  }

  /**
   * Fill the static partition from the manifest, all or nothing.
   * Every resource is downloaded before the partition is opened, so a failed
   * download never leaves a partition behind.
   */
  async precache(
    paths: readonly string[],
    fetcher: (request: Request) => Promise<Response>,
  ): Promise<void> {
    const requests = paths.map((path) => this.toRequest(path));
    const responses = await Promise.all(
      requests.map(async (request) => {
        let response: Response;
        try {
          response = await fetcher(request);
        } catch (error) {
          throw new PrecacheError(request.url, error instanceof Error ? error.message : String(error));
        }
        if (!response.ok) {
          throw new PrecacheError(request.url, `HTTP ${response.status}`);
        }
        return response;
      }),
    );

    const name = this.nameOf("static");
    const existed = await this.storage.has(name);
    const cache = await this.storage.open(name);
    try {
      for (let i = 0; i < requests.length; i++) {
        await cache.put(requests[i], responses[i]);
      }
    } catch (error) {
      if (!existed) {
        await this.storage.delete(name);
      }
      throw error;
    }
    log.install("precached %d resources into %s", requests.length, name);
  }

  /** Read-only: a missing partition is a miss, not something to create. */
  async match(kind: PartitionKind, request: CacheKey): Promise<Response | undefined> {
    const name = this.nameOf(kind);
    if (!(await this.storage.has(name))) {
      return undefined;
    }
    const cache = await this.storage.open(name);
    return cache.match(this.toRequest(request));
  }

  /** Look the request up in every partition. */
  matchAny(request: CacheKey): Promise<Response | undefined> {
    return this.storage.match(this.toRequest(request));
  }

  /**
   * Write an entry. A failed write (quota, storage eviction) is logged and
   * reported as `false`; it never rejects.
   */
  async put(kind: PartitionKind, request: CacheKey, response: Response): Promise<boolean> {
    const name = this.nameOf(kind);
    try {
      const cache = await this.storage.open(name);
      await cache.put(this.toRequest(request), response);
      log.cache("stored %s in %s", this.toRequest(request).url, name);
      return true;
    } catch (error) {
      console.warn(`Cache write to ${name} failed:`, error);
      return false;
    }
  }

  list(): Promise<string[]> {
    return this.storage.keys();
  }

  /** Delete every partition not named after the current versions. */
  async purgeStale(): Promise<string[]> {
    const current = new Set([this.nameOf("static"), this.nameOf("dynamic")]);
    const stale = (await this.storage.keys()).filter((name) => !current.has(name));
    await Promise.all(stale.map((name) => this.storage.delete(name)));
    for (const name of stale) {
      log.cache("removed stale partition %s", name);
    }
    return stale;
  }

  /** Delete every partition regardless of version. */
  async clear(): Promise<string[]> {
    const names = await this.storage.keys();
    await Promise.all(names.map((name) => this.storage.delete(name)));
    log.cache("cleared %d partitions", names.length);
    return names;
  }
}
