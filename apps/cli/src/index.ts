// apps/cli: modbump CLI entry point
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf8"));
  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}

await createProgram(readVersion()).parseAsync();
