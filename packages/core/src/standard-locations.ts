import os from "node:os";
import path from "node:path";

import { MissingConfigurationError } from "./errors";
import { type Environment, genPaths, getPath, toPath } from "./path-resolver";

export type RuntimeDirSource = "environment" | "fallback";

export type StandardLocations = Readonly<{
  home: string;
  dataHome: string;
  configHome: string;
  stateHome: string;
  cacheHome: string;
  dataDirs: readonly string[];
  configDirs: readonly string[];
  runtimeDir: string;
  /**
   * `fallback` means `/tmp/user-<uid>` was used: conventionally writable, but
   * without the ownership and permission guarantees of `XDG_RUNTIME_DIR`.
   */
  runtimeDirSource: RuntimeDirSource;
}>;

export type StandardLocationsOptions = {
  env?: Environment;
  homedir?: () => string;
  getuid?: () => number;
};

export const DEFAULT_DATA_DIRS = "/usr/local/share/:/usr/share/";
export const DEFAULT_CONFIG_DIRS = "/etc/xdg";

const defaultGetuid = () => {
  if (!process.getuid) {
    throw new MissingConfigurationError(
      "XDG_RUNTIME_DIR",
      "XDG_RUNTIME_DIR is not set and this platform has no user id for the fallback",
    );
  }
  return process.getuid();
};

const hasValue = (env: Environment, key: string) => {
  const value = env[key];
  return value != null && value.length > 0;
};

export const initializeStandardLocations = ({
  env = process.env,
  homedir = os.homedir,
  getuid = defaultGetuid,
}: StandardLocationsOptions = {}): StandardLocations => {
  const home = toPath(homedir());
  const runtimeDirSource: RuntimeDirSource = hasValue(env, "XDG_RUNTIME_DIR")
    ? "environment"
    : "fallback";

  return Object.freeze({
    home,
    dataHome: getPath("XDG_DATA_HOME", path.posix.join(home, ".local", "share"), env),
    configHome: getPath("XDG_CONFIG_HOME", path.posix.join(home, ".config"), env),
    stateHome: getPath("XDG_STATE_HOME", path.posix.join(home, ".local", "state"), env),
    cacheHome: getPath("XDG_CACHE_HOME", path.posix.join(home, ".cache"), env),
    dataDirs: Object.freeze([...genPaths("XDG_DATA_DIRS", DEFAULT_DATA_DIRS, env)]),
    configDirs: Object.freeze([...genPaths("XDG_CONFIG_DIRS", DEFAULT_CONFIG_DIRS, env)]),
    runtimeDir: getPath(
      "XDG_RUNTIME_DIR",
      runtimeDirSource === "fallback" ? `/tmp/user-${getuid()}` : null,
      env,
    ),
    runtimeDirSource,
  });
};

let processLocations: StandardLocations | null = null;

/**
 * Locations for this process, computed from `process.env` on first use and
 * never recomputed.
 */
export const getStandardLocations = (): StandardLocations => {
  if (!processLocations) {
    processLocations = initializeStandardLocations();
  }
  return processLocations;
};

export const dataSearchPaths = (locations: StandardLocations): string[] => [
  locations.dataHome,
  ...locations.dataDirs,
];

export const configSearchPaths = (locations: StandardLocations): string[] => [
  locations.configHome,
  ...locations.configDirs,
];
