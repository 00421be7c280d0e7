import type { TargetSpec } from "../config.ts";

/**
 * Host matches case-insensitively and exactly (`*` matches every host); the
 * port only matters when one is configured. The path is compared with the
 * request pathname, query string excluded: exactly, or as a prefix when the
 * configured path ends with `*`.
 */
export function matchesTarget(target: TargetSpec, req: { host: string; port: number; pathname: string }): boolean {
  const host = target.host.trim().toLowerCase();
  if (host !== "*" && host !== req.host.toLowerCase()) return false;
  if (target.port != null && target.port !== req.port) return false;
  if (target.path.endsWith("*")) return req.pathname.startsWith(target.path.slice(0, -1));
  return req.pathname === target.path;
}

export function describeTarget(target: TargetSpec): string {
  return `${target.host}${target.port != null ? `:${target.port}` : ""}${target.path}`;
}
