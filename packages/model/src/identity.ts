import { realpathSync } from "node:fs";
import path from "node:path";

import { RESERVED_PACKAGE_NAMES } from "./constants.js";

export interface IdentityOptions {
  /** Base directory for relative local paths. Defaults to process.cwd(). */
  cwd?: string;
}

// Errors after which the path is kept as written instead of resolved.
const UNRESOLVABLE_PATH_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP", "EACCES", "ENAMETOOLONG"]);

function isUnresolvablePathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }

  return typeof error.code === "string" && UNRESOLVABLE_PATH_CODES.has(error.code);
}

/**
 * Absolute path with symlinks and "."/".." collapsed. Components below the
 * deepest resolvable ancestor (missing, unreadable or caught in a symlink
 * loop) are kept as written.
 */
export function resolveRealPath(target: string, options: IdentityOptions = {}): string {
  const absolute = path.resolve(options.cwd ?? process.cwd(), target);

  try {
    return realpathSync(absolute);
  } catch (error) {
    if (!isUnresolvablePathError(error)) {
      throw error;
    }

    const parent = path.dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }

    return path.join(resolveRealPath(parent), path.basename(absolute));
  }
}

/**
 * Normalizes a package locator: one trailing slash is dropped, and local
 * paths (starting with "." or "/") become absolute real paths.
 */
export function canonicalUrl(locator: string, options: IdentityOptions = {}): string {
  const url = locator.endsWith("/") ? locator.slice(0, -1) : locator;

  if (url.startsWith(".") || url.startsWith("/")) {
    return resolveRealPath(url, options);
  }

  return url;
}

export function lastPathSegment(value: string): string {
  const segments = value.split("/");
  return segments[segments.length - 1] ?? value;
}

/** Package name implied by a git URL or local repository path. */
export function nameFromPath(locator: string, options: IdentityOptions = {}): string {
  return lastPathSegment(canonicalUrl(locator, options));
}

/**
 * Whether `name` may be used as a package name or alias: no surrounding
 * whitespace, no "/", no leading "." and not a reserved word.
 */
export function isValidName(name: string): boolean {
  if (name !== name.trim()) {
    return false;
  }

  if (name.includes("/")) {
    return false;
  }

  if (name.startsWith(".")) {
    return false;
  }

  return !RESERVED_PACKAGE_NAMES.includes(name);
}

/** Plain code unit ordering of identity keys. */
export function compareKeys(left: string, right: string): number {
  if (left < right) {
    return -1;
  }

  if (left > right) {
    return 1;
  }

  return 0;
}
