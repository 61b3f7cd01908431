#!/usr/bin/env node
import "dotenv/config";
import { buildProgram } from "./commands.js";

process.on("unhandledRejection", (reason) => {
  console.error("[switchyard] Unhandled rejection:", reason);
  process.exit(1);
});

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[switchyard] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
