import { ensureResource, findFirstResource, findResource } from "./resource-accessor";
import {
  configSearchPaths,
  dataSearchPaths,
  getStandardLocations,
  type StandardLocations,
} from "./standard-locations";

export type BaseDirs = {
  locations: StandardLocations;
  ensureDataResource: (...subPaths: string[]) => string;
  ensureConfigResource: (...subPaths: string[]) => string;
  ensureStateResource: (...subPaths: string[]) => string;
  ensureCacheResource: (...subPaths: string[]) => string;
  findDataResource: (...subPaths: string[]) => Generator<string>;
  findConfigResource: (...subPaths: string[]) => Generator<string>;
  findFirstDataResource: (...subPaths: string[]) => string | null;
  findFirstConfigResource: (...subPaths: string[]) => string | null;
};

export const createBaseDirs = (locations: StandardLocations): BaseDirs => {
  const dataPaths = dataSearchPaths(locations);
  const configPaths = configSearchPaths(locations);
  return {
    locations,
    ensureDataResource: (...subPaths) => ensureResource(locations.dataHome, ...subPaths),
    ensureConfigResource: (...subPaths) => ensureResource(locations.configHome, ...subPaths),
    ensureStateResource: (...subPaths) => ensureResource(locations.stateHome, ...subPaths),
    ensureCacheResource: (...subPaths) => ensureResource(locations.cacheHome, ...subPaths),
    findDataResource: (...subPaths) => findResource(dataPaths, ...subPaths),
    findConfigResource: (...subPaths) => findResource(configPaths, ...subPaths),
    findFirstDataResource: (...subPaths) => findFirstResource(dataPaths, ...subPaths),
    findFirstConfigResource: (...subPaths) => findFirstResource(configPaths, ...subPaths),
  };
};

let processBaseDirs: BaseDirs | null = null;

const resolveProcessBaseDirs = () => {
  if (!processBaseDirs) {
    processBaseDirs = createBaseDirs(getStandardLocations());
  }
  return processBaseDirs;
};

// Bound to the process-wide locations.
export const ensureDataResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().ensureDataResource(...subPaths);
export const ensureConfigResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().ensureConfigResource(...subPaths);
export const ensureStateResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().ensureStateResource(...subPaths);
export const ensureCacheResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().ensureCacheResource(...subPaths);
export const findDataResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().findDataResource(...subPaths);
export const findConfigResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().findConfigResource(...subPaths);
export const findFirstDataResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().findFirstDataResource(...subPaths);
export const findFirstConfigResource = (...subPaths: string[]) =>
  resolveProcessBaseDirs().findFirstConfigResource(...subPaths);
