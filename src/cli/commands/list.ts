import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { type ArchiveListing, errorMessage, listArchives } from "../../core";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { formatLogTimestamp } from "../../utils/naming";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "backup-root": { type: "string", short: "b" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const backupRoot = values["backup-root"] ?? (await findAndLoadConfig(values.config)).backupRoot;
    let archives = await listArchives(backupRoot);

    // Apply limit
    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      archives = archives.slice(0, limit);
    }

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(archives, null, 2));
      return 0;
    }

    ui.intro("zipshot list");

    if (archives.length === 0) {
      ui.info(`No archives found in ${backupRoot}`);
      ui.outro("Done");
      return 0;
    }

    printTable(archives);

    ui.outro(`${archives.length} archive(s) total`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(archives: ArchiveListing[]): void {
  const widths = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.created, TABLE_WIDTHS.size];

  ui.step("Archives:");
  console.log(formatTableRow(["Archive", "Created", "Size"], widths));
  console.log(formatTableSeparator(widths));

  for (const archive of archives) {
    console.log(
      formatTableRow(
        [archive.archiveName, formatLogTimestamp(archive.createdAt), formatBytes(archive.sizeBytes)],
        widths,
      ),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("zipshot list")} - List archives in the backup root

${color.dim("USAGE:")}
  zipshot list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Config file used to find the backup root
  -b, --backup-root <path>  Directory to list (overrides the config)
  -n, --limit <n>           Show only the newest n archives
      --format <fmt>        Output format: table (default) or json
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("EXAMPLES:")}
  zipshot list
  zipshot list -b /mnt/backups -n 5
  zipshot list --format json
`);
}
