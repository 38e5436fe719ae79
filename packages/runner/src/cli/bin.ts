#!/usr/bin/env node
import dotenv from "dotenv";
import { run } from "./bi-qa.js";

dotenv.config();

run(process.argv, {
  stdout: (s) => process.stdout.write(s),
  stderr: (s) => process.stderr.write(s),
  env: process.env,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[bi-qa] fatal:", e);
    process.exitCode = 1;
  }
);
