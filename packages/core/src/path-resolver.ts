import { MissingConfigurationError } from "./errors";

export type Environment = Readonly<Record<string, string | undefined>>;

const PATH_LIST_SEPARATOR = ":";

const resolveRoot = (value: string) => {
  if (!value.startsWith("/")) {
    return "";
  }
  // POSIX leaves exactly two leading slashes implementation-defined, so they stay.
  return value.startsWith("//") && !value.startsWith("///") ? "//" : "/";
};

/**
 * Lexical clean-up only: collapses repeated separators, drops `.` segments and
 * trailing separators. `..` is kept and relative paths stay relative.
 */
export const toPath = (value: string): string => {
  const root = resolveRoot(value);
  const segments = value.split("/").filter((segment) => segment.length > 0 && segment !== ".");
  const joined = segments.join("/");
  if (root.length > 0) {
    return `${root}${joined}`;
  }
  return joined.length > 0 ? joined : ".";
};

const readVariable = (env: Environment, variableName: string | null | undefined) => {
  if (!variableName) {
    return null;
  }
  const value = env[variableName];
  return value && value.length > 0 ? value : null;
};

export const getPath = (
  variableName: string | null | undefined,
  fallback?: string | null,
  env: Environment = process.env,
): string => {
  const value = readVariable(env, variableName) ?? (fallback || null);
  if (value == null) {
    throw new MissingConfigurationError(
      variableName ?? null,
      `Neither ${variableName ?? "<no variable>"} nor the fallback path are valid`,
    );
  }
  return toPath(value);
};

function* splitPathSpec(pathSpec: string): Generator<string> {
  for (const segment of pathSpec.split(PATH_LIST_SEPARATOR)) {
    yield getPath(null, segment);
  }
}

/**
 * Resolves a colon-separated path list. The source string is chosen eagerly, so a
 * missing variable with no fallback throws here rather than on first iteration.
 * An empty segment throws when it is reached.
 */
export const genPaths = (
  variableName: string,
  fallbackSpec?: string | null,
  env: Environment = process.env,
): Generator<string> => {
  const pathSpec = readVariable(env, variableName) ?? (fallbackSpec || null);
  if (pathSpec == null) {
    throw new MissingConfigurationError(
      variableName,
      `Neither ${variableName} nor the fallback paths are valid`,
    );
  }
  return splitPathSpec(pathSpec);
};
