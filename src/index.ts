#!/usr/bin/env node
import { runCli } from "./main";

runCli(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
