#!/usr/bin/env node
/**
 * CLI Entry Point
 */
import "dotenv/config";
import { runCli } from "./cli/program.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Error:", error);
    process.exitCode = 1;
  });
