#!/usr/bin/env node
import process from "node:process";

process.title = "loglens";

import("./cli/run-main.js")
  .then(({ runCli }) => runCli(process.argv))
  .catch((error: unknown) => {
    console.error(
      "[loglens] Failed to start CLI:",
      error instanceof Error ? (error.stack ?? error.message) : error,
    );
    process.exitCode = 1;
  });
