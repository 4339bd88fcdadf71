#!/usr/bin/env node

import { Command } from "commander";
import { initCommand } from "./commands/init";
import {
  scanCommand,
  scanListCommand,
  scanShowCommand,
  scanClearCommand,
} from "./commands/scan";
import { matchCommand } from "./commands/match";
import { statusCommand } from "./commands/status";
import { identitiesListCommand, identitiesShowCommand } from "./commands/identities";
import { errorMessage } from "./errors";
import { setLogLevel } from "./logger";

const program = new Command();

program
  .name("lookalike")
  .description("Find the celebrity from your photo archive you look most like")
  .version("0.1.0")
  .option("--debug", "Log debug output to stderr")
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts().debug === true) {
      setLogLevel("debug");
    }
  });

program
  .command("init")
  .description("Create a default config file")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

// Scan command - primary action is scanning, subcommands for history
const scan = program
  .command("scan")
  .description("Build the celebrity database from an archive and manage scan history")
  .argument("[path]", "Archive folder with one subfolder per celebrity")
  .option("--rescan", "Recompute every embedding instead of reusing cached ones")
  .option("-v, --verbose", "List every identity after the scan")
  .option("--json", "Output the finished scan as JSON")
  .action((path: string | undefined, options) => scanCommand(path, options));

scan
  .command("list")
  .description("List recent scans with stats")
  .option("-l, --limit <number>", "Number of scans to show", parseInt)
  .option("--json", "Output as JSON")
  .action(scanListCommand);

scan
  .command("show")
  .description("Show details for a specific scan")
  .argument("<id>", "Scan ID")
  .option("--json", "Output as JSON")
  .action(scanShowCommand);

scan
  .command("clear")
  .description("Clear scan history (keeps identities)")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(scanClearCommand);

program
  .command("match")
  .description("Rank celebrities by resemblance to a photo")
  .argument("<photo>", "Photo with one face (jpg, jpeg, png, gif, bmp, webp)")
  .option("-k, --top <number>", "Number of matches to show", parseInt)
  .option("--json", "Output as JSON")
  .action(matchCommand);

program
  .command("status")
  .description("Show configuration and database status")
  .action(statusCommand);

const identities = program
  .command("identities")
  .description("List identities in the celebrity database")
  .option("--missing", "Only identities without a face embedding")
  .option("--json", "Output as JSON")
  .action(identitiesListCommand);

identities
  .command("show")
  .description("Show details for an identity")
  .argument("<name>", "Identity name")
  .option("--json", "Output as JSON")
  .action(identitiesShowCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
