#!/usr/bin/env tsx
import { runCli } from "./run.js";

runCli(process.argv.slice(2), { stdout: process.stdout }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("jdex failed:", err);
    process.exitCode = 1;
  },
);
