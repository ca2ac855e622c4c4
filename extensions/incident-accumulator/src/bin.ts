#!/usr/bin/env node
import { Command } from "commander";
import { registerLedgerCli } from "./cli.js";
import { VERSION } from "./index.js";

const program = new Command("incident-ledger")
  .description("Accumulate traffic incidents from a polled feed into a duplicate-free store")
  .version(VERSION);

registerLedgerCli({
  program,
  logger: {
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
