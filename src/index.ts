#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../package.json";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { startCommand } from "./cli/commands/start";

const VERSION = pkg.version;

function printHelp(): void {
  p.intro(`${color.bold(color.cyan("zipshot"))} ${color.dim(`v${VERSION}`)} - Scheduled incremental zip backups`);

  p.note(
    `${color.cyan("start")}       Start scheduled backups
${color.cyan("restore")}     Restore an archive into a directory
${color.cyan("list")}        List archives in the backup root`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `zipshot start                              ${color.dim("# Use ./zipshot.config.yaml")}
zipshot start -s ./data -b ./backups       ${color.dim("# Without a config file")}
zipshot restore                            ${color.dim("# Pick an archive interactively")}
zipshot list                               ${color.dim("# List archives")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("zipshot <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("zipshot --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
