import type { ShellConfig } from "../shared/shell-config.js";
import { cacheFirst, networkFirst, type Strategy } from "./strategies.js";

export type RouteName = "bypass" | "static" | "document";

export interface Route {
  name: RouteName;
  matches: (url: URL, request: Request) => boolean;
  /** null: leave the request to the browser untouched. */
  strategy: Strategy | null;
}

function hasPrefix(pathname: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => pathname.startsWith(prefix));
}

function extensionOf(pathname: string): string {
  const lastSegment = pathname.slice(pathname.lastIndexOf("/") + 1);
  const dot = lastSegment.lastIndexOf(".");
  return dot === -1 ? "" : lastSegment.slice(dot + 1).toLowerCase();
}

/** Ordered route table; the first matching route wins. */
export function createRoutes(config: ShellConfig): Route[] {
  const extensions = new Set(config.assetExtensions);
  return [
    {
      name: "bypass",
      matches: (url, request) =>
        request.method !== "GET" || hasPrefix(url.pathname, config.bypassPrefixes),
      strategy: null,
    },
    {
      name: "static",
      matches: (url) =>
        hasPrefix(url.pathname, config.staticPrefixes) || extensions.has(extensionOf(url.pathname)),
      strategy: cacheFirst,
    },
    {
      name: "document",
      matches: () => true,
      strategy: networkFirst,
    },
  ];
}

export function resolveRoute(routes: readonly Route[], request: Request): Route {
  const url = new URL(request.url);
  const route = routes.find((candidate) => candidate.matches(url, request));
  if (!route) {
    throw new Error(`No route for ${request.url}`);
  }
  return route;
}
