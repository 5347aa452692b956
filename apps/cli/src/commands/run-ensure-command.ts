import type { BaseDirs } from "@basedirs/core";

type EnsureCommandOptions = {
  category: "data" | "config" | "state" | "cache";
  subPaths: string[];
};

const ensureFor = (baseDirs: BaseDirs, { category, subPaths }: EnsureCommandOptions) => {
  switch (category) {
    case "data":
      return baseDirs.ensureDataResource(...subPaths);
    case "config":
      return baseDirs.ensureConfigResource(...subPaths);
    case "state":
      return baseDirs.ensureStateResource(...subPaths);
    case "cache":
      return baseDirs.ensureCacheResource(...subPaths);
  }
};

export const runEnsureCommand = (baseDirs: BaseDirs, options: EnsureCommandOptions) => {
  console.log(ensureFor(baseDirs, options));
};
