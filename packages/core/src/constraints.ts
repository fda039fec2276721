import { readFile } from "node:fs/promises";
import { parseConstraints } from "@modbump/version";
import type { Constraints } from "@modbump/version";
import { UsageError } from "./errors.js";

export interface ConstraintFlags {
  constraint?: string | undefined;
  constraintFile?: string | undefined;
}

/**
 * Constraint file format: one or more comma-separated constraints per line.
 * Blank lines and lines starting with `#` are ignored.
 */
export function parseConstraintFile(text: string): Constraints {
  const expressions = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
  return expressions.length === 0 ? [] : parseConstraints(expressions.join(","));
}

/** Constraints from `--constraint` or `--constraint-file`; empty when neither is set. */
export async function loadConstraints(flags: ConstraintFlags): Promise<Constraints> {
  if (flags.constraint !== undefined && flags.constraintFile !== undefined) {
    throw new UsageError("Cannot use both --constraint and --constraint-file");
  }
  if (flags.constraint !== undefined) {
    return parseConstraints(flags.constraint);
  }
  if (flags.constraintFile !== undefined) {
    let text: string;
    try {
      text = await readFile(flags.constraintFile, "utf8");
    } catch (err) {
      throw new UsageError(
        `Cannot read constraint file ${flags.constraintFile}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    return parseConstraintFile(text);
  }
  return [];
}
