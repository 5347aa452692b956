#!/usr/bin/env node
import { createBaseDirs, getStandardLocations, isBaseDirError } from "@basedirs/core";

import { CliUsageError, parseArgs, resolveCliCommand } from "./cli";
import { runEnsureCommand } from "./commands/run-ensure-command";
import { runFindCommand } from "./commands/run-find-command";
import { runGetCommand } from "./commands/run-get-command";
import { runLocationsCommand } from "./commands/run-locations-command";

export const USAGE_EXIT_CODE = 2;

export const runCli = (argv: string[]): number => {
  const command = resolveCliCommand(parseArgs(argv));
  const locations = getStandardLocations();

  switch (command.command) {
    case "locations":
      runLocationsCommand(locations, { json: command.json });
      return 0;
    case "get":
      runGetCommand(locations, command.name);
      return 0;
    case "find":
      return runFindCommand(createBaseDirs(locations), command);
    case "ensure":
      runEnsureCommand(createBaseDirs(locations), command);
      return 0;
  }
};

const describeError = (error: unknown) => {
  if (isBaseDirError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
};

export const main = (argv = process.argv.slice(2)): number => {
  try {
    return runCli(argv);
  } catch (error) {
    console.error(`[basedirs] ${describeError(error)}`);
    return error instanceof CliUsageError ? USAGE_EXIT_CODE : 1;
  }
};

if (process.env.NODE_ENV !== "test") {
  process.exitCode = main();
}
