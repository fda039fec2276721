// apps/cli/src/errors.ts: error reporting and exit codes
import { ConfigError, InvalidDurationError, UsageError } from "@modbump/core";
import { InvalidConstraintError, UnknownStrategyError } from "@modbump/version";
import pc from "picocolors";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Bad flags, constraints or configuration exit with 2; anything else with 1. */
export function exitCodeFor(err: unknown): number {
  if (
    err instanceof UsageError ||
    err instanceof ConfigError ||
    err instanceof InvalidDurationError ||
    err instanceof InvalidConstraintError ||
    err instanceof UnknownStrategyError
  ) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(pc.red(`Error: ${message}`));
  if (err instanceof Error && err.cause instanceof Error) {
    console.error(pc.dim(`  caused by: ${err.cause.message}`));
  }
  process.exitCode = exitCodeFor(err);
}
