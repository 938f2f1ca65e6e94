#!/usr/bin/env node
import pico from "picocolors";
import { hideBin } from "yargs/helpers";
import { runCli } from "../cli/RunNetbenchCLI.ts";
import { NetbenchError } from "../Errors.ts";

runCli(hideBin(process.argv)).catch((err: unknown) => {
  if (err instanceof NetbenchError) console.error(pico.red(err.message));
  else console.error(err);
  process.exitCode = 1;
});
