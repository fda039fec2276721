// apps/cli/src/program.ts: assembles the modbump command tree
import { Command } from "commander";
import { createCacheCommand } from "./commands/cache.js";
import { createShowCommand } from "./commands/show.js";
import { createUpdateCommand } from "./commands/update.js";

export function createProgram(version: string): Command {
  return new Command()
    .name("modbump")
    .description("Keep Terraform module versions current.")
    .version(version, "-v, --version")
    .addCommand(createShowCommand())
    .addCommand(createUpdateCommand())
    .addCommand(createCacheCommand());
}
