// src/core/namespace/path.ts

/**
 * Normalize a namespace path: leading slash enforced, repeated slashes
 * collapsed, trailing slash dropped (except for the root). Idempotent.
 */
export function normalizePath(path: string): string {
  let p = path.startsWith("/") ? path : `/${path}`;
  p = p.replace(/\/{2,}/g, "/");
  if (p !== "/" && p.endsWith("/")) p = p.slice(0, -1);
  return p;
}

/** True when `path` equals `prefix` or lies beneath it. */
export function isUnder(path: string, prefix: string): boolean {
  const root = normalizePath(prefix);
  if (root === "/") return true;
  return path === root || path.startsWith(`${root}/`);
}
