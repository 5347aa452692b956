import type { ArgsDef, ParsedArgs as CittyParsedArgs } from "citty";
import { parseArgs as parseCittyArgs } from "citty";
import { z } from "zod";

export const LOCATION_NAMES = [
  "home",
  "data-home",
  "config-home",
  "state-home",
  "cache-home",
  "data-dirs",
  "config-dirs",
  "runtime-dir",
] as const;

export const ENSURE_CATEGORIES = ["data", "config", "state", "cache"] as const;
export const FIND_CATEGORIES = ["data", "config"] as const;

const cliArgDefinitions = {
  command: { type: "positional", required: false },
  json: { type: "boolean", default: false },
  all: { type: "boolean", default: false },
} satisfies ArgsDef;

export type ParsedArgs = CittyParsedArgs<typeof cliArgDefinitions>;

const subPathsSchema = z
  .array(z.string().min(1, "sub-path components must not be empty"))
  .min(1, "at least one sub-path component is required");

export const cliCommandSchema = z.discriminatedUnion("command", [
  z.object({
    command: z.literal("locations"),
    json: z.boolean(),
  }),
  z.object({
    command: z.literal("get"),
    name: z.enum(LOCATION_NAMES),
  }),
  z.object({
    command: z.literal("find"),
    category: z.enum(FIND_CATEGORIES),
    subPaths: subPathsSchema,
    all: z.boolean(),
  }),
  z.object({
    command: z.literal("ensure"),
    category: z.enum(ENSURE_CATEGORIES),
    subPaths: subPathsSchema,
  }),
]);

export type CliCommand = z.infer<typeof cliCommandSchema>;
export type LocationName = (typeof LOCATION_NAMES)[number];

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const normalizeRawArgv = (argv: string[]) => argv.filter((token) => token !== "--");

export const parseArgs = (argv = process.argv.slice(2)): ParsedArgs =>
  parseCittyArgs<typeof cliArgDefinitions>(normalizeRawArgv(argv), cliArgDefinitions);

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => {
      const prefix = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `- ${prefix}${issue.message}`;
    })
    .join("\n");

const toCandidate = (args: ParsedArgs) => {
  const [command = "locations", first, ...rest] = args._;
  switch (command) {
    case "locations":
      return { command, json: args.json === true };
    case "get":
      return { command, name: first };
    case "find":
      return {
        command,
        category: first,
        subPaths: rest,
        all: args.all === true,
      };
    case "ensure":
      return { command, category: first, subPaths: rest };
    default:
      return { command };
  }
};

export const resolveCliCommand = (args: ParsedArgs): CliCommand => {
  const result = cliCommandSchema.safeParse(toCandidate(args));
  if (!result.success) {
    throw new CliUsageError(`invalid arguments:\n${formatIssues(result.error)}`);
  }
  return result.data;
};
