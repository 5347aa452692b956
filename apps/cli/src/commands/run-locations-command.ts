import type { StandardLocations } from "@basedirs/core";

import { LOCATION_NAMES } from "../cli";
import { readLocation, warnIfRuntimeDirFallback } from "./location-values";

const renderValue = (value: string | readonly string[]) =>
  typeof value === "string" ? value : value.join(":");

export const renderLocationsText = (locations: StandardLocations) =>
  LOCATION_NAMES.map((name) => `${name}=${renderValue(readLocation(locations, name))}`).join(
    "\n",
  );

export const runLocationsCommand = (
  locations: StandardLocations,
  { json }: { json: boolean },
) => {
  warnIfRuntimeDirFallback(locations);
  if (json) {
    console.log(JSON.stringify(locations, null, 2));
    return;
  }
  console.log(renderLocationsText(locations));
};
