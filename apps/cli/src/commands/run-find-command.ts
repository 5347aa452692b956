import type { BaseDirs } from "@basedirs/core";

export const NOT_FOUND_EXIT_CODE = 3;

type FindCommandOptions = {
  category: "data" | "config";
  subPaths: string[];
  all: boolean;
};

const resolveMatches = (baseDirs: BaseDirs, { category, subPaths, all }: FindCommandOptions) => {
  if (all) {
    const matches =
      category === "data"
        ? baseDirs.findDataResource(...subPaths)
        : baseDirs.findConfigResource(...subPaths);
    return [...matches];
  }
  const first =
    category === "data"
      ? baseDirs.findFirstDataResource(...subPaths)
      : baseDirs.findFirstConfigResource(...subPaths);
  return first == null ? [] : [first];
};

export const runFindCommand = (baseDirs: BaseDirs, options: FindCommandOptions): number => {
  const matches = resolveMatches(baseDirs, options);
  if (matches.length === 0) {
    console.error(`[basedirs] No ${options.category} resource found: ${options.subPaths.join("/")}`);
    return NOT_FOUND_EXIT_CODE;
  }
  matches.forEach((match) => {
    console.log(match);
  });
  return 0;
};
