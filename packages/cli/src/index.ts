#!/usr/bin/env tsx
import { config as loadDotenv } from "dotenv";
import chalk from "chalk";
import { describeError } from "@jules-monitor/core";
import { createProgram } from "./program.js";

loadDotenv();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(describeError(err)));
    process.exit(1);
  });
