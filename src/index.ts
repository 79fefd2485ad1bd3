#!/usr/bin/env node

import { setupCLI } from './cli.js';
import { colors } from './utils/colors.js';
import process from "node:process";

setupCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(colors.red(`[ERROR]: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
