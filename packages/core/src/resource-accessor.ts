import fs from "node:fs";
import path from "node:path";

import { FilesystemError, PathEscapeError } from "./errors";
import { toPath } from "./path-resolver";

const posix = path.posix;

const appendComponent = (current: string, component: string) => {
  if (posix.isAbsolute(component)) {
    return component;
  }
  return current.endsWith("/") ? `${current}${component}` : `${current}/${component}`;
};

const joinComponents = (base: string, subPaths: readonly string[]) =>
  toPath(subPaths.reduce(appendComponent, base));

const isWithin = (base: string, candidate: string) => {
  const relative = posix.relative(base, candidate);
  if (relative.length === 0) {
    return true;
  }
  return relative !== ".." && !relative.startsWith("../") && !posix.isAbsolute(relative);
};

/**
 * Joins `subPaths` onto `base` (an absolute component restarts the path) and
 * checks lexically that the result is `base` or lies beneath it. `..` is only
 * resolved for the check; the returned path keeps it.
 */
export const joinWithinBase = (base: string, subPaths: readonly string[]): string => {
  const candidate = joinComponents(base, subPaths);
  if (!isWithin(posix.normalize(base), posix.normalize(candidate))) {
    throw new PathEscapeError(base, candidate);
  }
  return candidate;
};

/**
 * Creates `base/...subPaths` with any missing parents and returns it. An
 * existing directory is not an error.
 */
export const ensureResource = (base: string, ...subPaths: string[]): string => {
  const target = joinWithinBase(base, subPaths);
  try {
    fs.mkdirSync(target, { recursive: true });
  } catch (error) {
    throw new FilesystemError(target, error);
  }
  return target;
};

/**
 * Yields `base/...subPaths` for every base where it currently exists, in the
 * order of `basePaths`. Existence is checked as each element is produced.
 */
export function* findResource(
  basePaths: Iterable<string>,
  ...subPaths: string[]
): Generator<string> {
  const subPath = joinComponents(".", subPaths);
  for (const base of basePaths) {
    const candidate = joinWithinBase(base, [subPath]);
    if (fs.existsSync(candidate)) {
      yield candidate;
    }
  }
}

export const findFirstResource = (
  basePaths: Iterable<string>,
  ...subPaths: string[]
): string | null => {
  for (const candidate of findResource(basePaths, ...subPaths)) {
    return candidate;
  }
  return null;
};
