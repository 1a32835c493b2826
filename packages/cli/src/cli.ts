#!/usr/bin/env node

/**
 * paramstore CLI entry point
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2));
