#!/usr/bin/env node
import { runCli } from "./cli.js";

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}
