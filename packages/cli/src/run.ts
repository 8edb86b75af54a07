/**
 * @ledgerline/cli — Command runner.
 *
 * One positional argument, the input CSV path. Writes the account CSV to
 * stdout and returns the process exit code; nothing reaches stdout when
 * the run fails.
 */

import chalk from "chalk";
import type { ZodError } from "zod";
import { Ledger } from "@ledgerline/ledger";
import { TransactionReader, writeAccounts } from "@ledgerline/csv";
import type { TextSink } from "@ledgerline/csv";
import { ConfigSchema } from "./config.js";
import { EXIT_CODES, exitCodeFor } from "./exit-codes.js";
import type { ExitCode } from "./exit-codes.js";
import { createLogger } from "./logger.js";
import { processTransactions } from "./processor.js";

export interface RunIo {
  readonly stdout: TextSink;
  readonly stderr: TextSink;
}

export const USAGE = "usage: ledgerline <transactions.csv> > accounts.csv";

function printError(stderr: TextSink, message: string): void {
  stderr.write(`${chalk.red.bold("error:")} ${message}\n`);
}

function describeConfigError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

/**
 * Run the replay for the given arguments.
 *
 * @throws errors outside the ledger/CSV taxonomy (programming faults)
 */
export function run(
  argv: readonly string[],
  io: RunIo,
  env: Record<string, string | undefined> = process.env,
): ExitCode {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    printError(io.stderr, `invalid configuration: ${describeConfigError(parsed.error)}`);
    return EXIT_CODES.USAGE;
  }
  const config = parsed.data;
  const logger = createLogger(config, io.stderr);

  const inputPath = argv[0];
  if (inputPath === undefined || inputPath === "") {
    printError(io.stderr, "missing input file");
    io.stderr.write(`${chalk.gray(USAGE)}\n`);
    return EXIT_CODES.USAGE;
  }

  try {
    logger.info({ inputPath, onError: config.ON_ERROR }, "Replay started");

    const reader = TransactionReader.fromFile(inputPath, { delimiter: config.CSV_DELIMITER });
    const ledger = new Ledger();
    const summary = processTransactions(reader, ledger, {
      logger,
      onError: config.ON_ERROR,
    });

    writeAccounts(ledger.exportAccounts(), io.stdout, { precision: config.AMOUNT_PRECISION });

    logger.info(
      { applied: summary.applied, rejected: summary.rejected.length, accounts: ledger.accountCount },
      "Replay finished",
    );
    return EXIT_CODES.OK;
  } catch (err) {
    const code = exitCodeFor(err);
    if (code === undefined || !(err instanceof Error)) {
      throw err;
    }
    logger.error({ err, exitCode: code }, "Replay aborted");
    printError(io.stderr, err.message);
    return code;
  }
}
