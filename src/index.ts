#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./errors";

runCli().catch((err) => {
  console.error(`Failed to build duplicate report: ${errorMessage(err)}`);
  process.exitCode = 1;
});
