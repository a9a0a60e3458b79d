#!/usr/bin/env node
/**
 * verify CLI - verification engine for feature checklists
 */

import { Command } from "commander";
import { configureAXErrors } from "./ax/error-hints.js";
import { registerBadgesCommand, registerStatsCommand } from "./commands/badges.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerHumanCommands } from "./commands/human.js";
import { registerIssuesCommands } from "./commands/issues.js";
import { registerRunCommand } from "./commands/run.js";
import { registerScenarioCommands } from "./commands/scenario.js";

const program = new Command();

program
	.name("verify")
	.description("Machine, human and scenario verification of feature checklists")
	.version("0.1.0")
	.option("--as <identity>", "Identity recorded for human actions (default: $USER)");

registerRunCommand(program);
registerScenarioCommands(program);
registerHumanCommands(program);
registerIssuesCommands(program);
registerStatsCommand(program);
registerBadgesCommand(program);
registerCheckCommand(program);

// Configure AX error hints before parsing
configureAXErrors(program);

await program.parseAsync();
