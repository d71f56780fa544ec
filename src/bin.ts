#!/usr/bin/env node
// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { runCli } from "./cli.js";
import { errorMessage } from "./errors.js";

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
);
