#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

// Crash loudly on anything that escapes a command action
process.on("unhandledRejection", (reason) => {
  console.error("[wayfarer] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[wayfarer] Uncaught exception:", err);
  process.exit(1);
});

await createProgram().parseAsync();
