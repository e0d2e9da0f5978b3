#!/usr/bin/env node
"use strict";

import { runCli } from "../cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: line => console.log(line),
    stderr: line => console.error(line)
  });
}

void main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
