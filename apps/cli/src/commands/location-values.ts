import type { StandardLocations } from "@basedirs/core";

import type { LocationName } from "../cli";

export const readLocation = (
  locations: StandardLocations,
  name: LocationName,
): string | readonly string[] => {
  switch (name) {
    case "home":
      return locations.home;
    case "data-home":
      return locations.dataHome;
    case "config-home":
      return locations.configHome;
    case "state-home":
      return locations.stateHome;
    case "cache-home":
      return locations.cacheHome;
    case "data-dirs":
      return locations.dataDirs;
    case "config-dirs":
      return locations.configDirs;
    case "runtime-dir":
      return locations.runtimeDir;
  }
};

export const warnIfRuntimeDirFallback = (locations: StandardLocations) => {
  if (locations.runtimeDirSource !== "fallback") {
    return;
  }
  console.warn(
    `[basedirs] XDG_RUNTIME_DIR is not set. Using ${locations.runtimeDir}, which has no ownership or permission guarantees.`,
  );
};
