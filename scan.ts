#!/usr/bin/env node
/**
 * Mission Scanner CLI
 *
 * Lists declared classes and referenced equipment in Arma mission files
 * (.sqf, .hpp, .ext), for one file or a whole mission directory.
 *
 * Usage:
 *   npx tsx scan.ts path/to/mission --format json -o report.json
 *
 * Environment variables (or .env file):
 *   LOG_LEVEL (error|warn|info|debug|silent, default: info)
 *   SAMPLE_DATA_DIR (fallback directory for .hpp files)
 */
import "dotenv/config";
import { run } from "./src/cli.js";

process.exitCode = run(process.argv.slice(2));
