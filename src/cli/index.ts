#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import { registerSearchCommand } from "./commands/search.js";
import { registerExplainCommand } from "./commands/explain.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerConfigCommand } from "./commands/config.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

const program = new Command();

program
  .name("csearch")
  .description("catalog-search: federated search over buckets and data packages")
  .version(version)
  .option("--verbose", "Enable verbose/debug output");

registerSearchCommand(program);
registerExplainCommand(program);
registerStatusCommand(program);
registerConfigCommand(program);

await program.parseAsync();
