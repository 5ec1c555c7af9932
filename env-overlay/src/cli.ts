#!/usr/bin/env node
import { runCli } from "./runCli.js";

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[env-overlay] fatal", err);
    process.exitCode = 1;
  });
