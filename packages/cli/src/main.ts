#!/usr/bin/env node
/**
 * @ledgerline/cli — Entry point.
 *
 *   ledgerline transactions.csv > accounts.csv
 */

import { run } from "./run.js";

try {
  process.exitCode = run(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
  });
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
