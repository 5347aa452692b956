import type { StandardLocations } from "@basedirs/core";

import type { LocationName } from "../cli";
import { readLocation, warnIfRuntimeDirFallback } from "./location-values";

export const runGetCommand = (locations: StandardLocations, name: LocationName) => {
  if (name === "runtime-dir") {
    warnIfRuntimeDirFallback(locations);
  }
  const value = readLocation(locations, name);
  if (typeof value === "string") {
    console.log(value);
    return;
  }
  value.forEach((entry) => {
    console.log(entry);
  });
};
