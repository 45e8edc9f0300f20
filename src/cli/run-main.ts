import process from "node:process";

import { formatUncaughtError, isBrokenPipeError } from "../infra/errors.js";

let handlersInstalled = false;

function installProcessErrorHandlers() {
  if (handlersInstalled) return;
  handlersInstalled = true;

  process.on("unhandledRejection", (reason) => {
    console.error("[loglens] Unhandled promise rejection:", formatUncaughtError(reason));
    process.exit(1);
  });

  process.on("uncaughtException", (error) => {
    // stdout went away between writes; nothing left to report to
    if (isBrokenPipeError(error)) process.exit(1);
    console.error("[loglens] Uncaught exception:", formatUncaughtError(error));
    process.exit(1);
  });
}

export async function runCli(argv: string[] = process.argv) {
  const { buildProgram } = await import("./program.js");
  const program = buildProgram();

  installProcessErrorHandlers();

  await program.parseAsync(argv);
}
