import type { Argv, InferredOptionTypes } from "yargs";

/** Options shared by every command */
export type CommonArgs = InferredOptionTypes<typeof commonOptions>;

export type SequenceArgs = CommonArgs &
  InferredOptionTypes<typeof sequenceOptions>;

export type SimulateArgs = CommonArgs &
  InferredOptionTypes<typeof simulateOptions>;

// biome-ignore format: compact option definitions
export const commonOptions = {
  json:  { type: "string",  requiresArg: true, describe: "export results to JSON file" },
  quiet: { type: "boolean", default: false, describe: "don't warn about skipped records" },
} as const;

// biome-ignore format: compact option definitions
export const sequenceOptions = {
  "stream-id": { type: "number", requiresArg: true, describe: "only count frames of this R-TAG stream (capture input)" },
} as const;

// biome-ignore format: compact option definitions
export const simulateOptions = {
  samples: { type: "number", default: 1000, describe: "latency samples per path" },
  seed:    { type: "number", requiresArg: true, describe: "random seed (printed when omitted, for reruns)" },
} as const;

/** @return yargs with options shared by all commands */
export function defaultCliArgs(yargsInstance: Argv): Argv<CommonArgs> {
  return yargsInstance
    .scriptName("netbench")
    .options(commonOptions)
    .demandCommand(1, "Specify a command")
    .help()
    .strict();
}
