/**
 * Location arithmetic. Locations are POSIX-style paths relative to the
 * documentation root; platform separators only appear at the file-system
 * boundary.
 */

import * as path from "node:path";
import type { Location } from "./models.js";

/**
 * Normalize a root-relative path. Returns null for paths that cannot be a
 * tracked location: empty, absolute, escaping the root, or naming a
 * directory.
 */
export function normalizeLocation(raw: string): Location | null {
  const unified = raw.normalize("NFC").replace(/\\/g, "/");
  if (unified === "" || unified.startsWith("/") || /^[a-zA-Z]:\//.test(unified)) {
    return null;
  }
  if (unified.endsWith("/")) {
    return null;
  }

  const normalized = path.posix.normalize(unified);
  if (normalized === "." || normalized === ".." || normalized.startsWith("../")) {
    return null;
  }
  return normalized;
}

/**
 * Directory part of a location ("" for documents at the root).
 */
export function locationDir(location: Location): string {
  const dir = path.posix.dirname(location);
  return dir === "." ? "" : dir;
}

/**
 * Resolve a relative path written inside `fromLocation`.
 * Returns null when the result leaves the documentation root.
 */
export function resolveRelativeTarget(
  fromLocation: Location,
  relativePath: string,
): Location | null {
  if (relativePath === "" || relativePath.startsWith("/")) {
    return null;
  }
  return normalizeLocation(path.posix.join(locationDir(fromLocation), relativePath));
}

/**
 * Relative path that leads from `fromLocation` to `toLocation`.
 */
export function relativeReference(fromLocation: Location, toLocation: Location): string {
  // Anchoring both at "/" keeps posix.relative away from process.cwd().
  return path.posix.relative(`/${locationDir(fromLocation)}`, `/${toLocation}`);
}

/**
 * Code-point ordering. Independent of the host locale.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Convert an absolute file path under `rootDir` into a location.
 */
export function toLocation(rootDir: string, filePath: string): Location | null {
  const relative = path.relative(rootDir, filePath);
  return normalizeLocation(relative.split(path.sep).join("/"));
}

/**
 * Absolute file path of a location under `rootDir`.
 */
export function toFilePath(rootDir: string, location: Location): string {
  return path.join(rootDir, ...location.split("/"));
}
