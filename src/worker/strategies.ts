import createDebug from "debug";
import type { CacheStore } from "./cache-store.js";

const log = createDebug("offline-shell:fetch");

export interface StrategyContext {
  request: Request;
  store: CacheStore;
  network: (request: Request) => Promise<Response>;
  /** Path of the precached document served to HTML requests when offline. */
  rootDocument: string;
  /** Keep the triggering event alive until background work settles. */
  waitUntil: (work: Promise<unknown>) => void;
}

export type Strategy = (context: StrategyContext) => Promise<Response>;

/** Only complete, same-origin responses may be kept. */
export function isStorable(response: Response): boolean {
  return response.status === 200 && (response.type === "basic" || response.type === "default");
}

function acceptsHtml(request: Request): boolean {
  return request.headers.get("accept")?.includes("text/html") ?? false;
}

/** Static partition first; on a miss go to the network and keep good responses. */
export const cacheFirst: Strategy = async ({ request, store, network, waitUntil }) => {
  const cached = await store.match("static", request);
  if (cached) {
    log("static hit %s", request.url);
    return cached;
  }

  const response = await network(request);
  if (isStorable(response)) {
    waitUntil(store.put("static", request, response.clone()));
  }
  return response;
};

/**
 * Network first; successful responses refresh the dynamic partition.
 * Offline, fall back to any cached copy, then to the root document for
 * HTML requests, and otherwise rethrow the network error.
 */
export const networkFirst: Strategy = async ({ request, store, network, rootDocument, waitUntil }) => {
  try {
    const response = await network(request);
    if (response.status === 200) {
      waitUntil(store.put("dynamic", request, response.clone()));
    }
    return response;
  } catch (error) {
    const cached = await store.matchAny(request);
    if (cached) {
      log("offline, serving cached %s", request.url);
      return cached;
    }
    if (acceptsHtml(request)) {
      const fallback = await store.matchAny(rootDocument);
      if (fallback) {
        log("offline, serving root document for %s", request.url);
        return fallback;
      }
    }
    throw error;
  }
};
