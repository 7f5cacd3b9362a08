#!/usr/bin/env node
// src/cli.ts
import { main } from "./cli-program.js";

void main().then((code) => {
  process.exitCode = code;
});
