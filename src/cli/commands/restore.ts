import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { BackupService, errorMessage, listArchives, RestoreFailureError } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { formatLogTimestamp } from "../../utils/naming";
import { color, formatSummary, ui } from "../ui";

async function resolveBackupRoot(values: { config?: string; "backup-root"?: string }): Promise<string> {
  if (values["backup-root"]) {
    return values["backup-root"];
  }
  const config = await findAndLoadConfig(values.config);
  return config.backupRoot;
}

async function promptForArchive(backupRoot: string): Promise<string | null> {
  const archives = await listArchives(backupRoot);

  if (archives.length === 0) {
    ui.error(`No archives found in ${backupRoot}`);
    return null;
  }

  const selected = await ui.select({
    message: "Select an archive to restore",
    options: archives.map((a) => ({
      value: a.archivePath,
      label: a.archiveName,
      hint: `${formatLogTimestamp(a.createdAt)}, ${formatBytes(a.sizeBytes)}`,
    })),
  });

  return ui.isCancel(selected) ? null : selected;
}

async function promptForDestination(): Promise<string | null> {
  const entered = await ui.text({
    message: "Restore into which directory?",
    placeholder: "./restored",
    validate: (value) => (value && value.trim() ? undefined : "A destination directory is required"),
  });

  return ui.isCancel(entered) ? null : entered.trim();
}

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "backup-root": { type: "string", short: "b" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    ui.intro("zipshot restore");

    const archivePath = positionals[0] ?? (await promptForArchive(await resolveBackupRoot(values)));
    if (!archivePath) {
      ui.cancel("Restore cancelled");
      return 1;
    }

    const destination = positionals[1] ?? (await promptForDestination());
    if (!destination) {
      ui.cancel("Restore cancelled");
      return 1;
    }

    const result = await BackupService.restore(archivePath, destination, (message) => ui.message(message));

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archivePath },
        { label: "Destination", value: result.destinationDir },
        { label: "Files", value: result.files.length },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Restore Summary",
    );

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    if (error instanceof RestoreFailureError) {
      // The message was already shown through the log sink
      if (error.entriesRestored > 0) {
        ui.warn(`${error.entriesRestored} file(s) were written before the failure`);
      }
    } else {
      ui.error(`Restore failed: ${errorMessage(error)}`);
    }
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("zipshot restore")} - Restore an archive into a directory

${color.dim("USAGE:")}
  zipshot restore [ARCHIVE] [DESTINATION] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Config file used to find the backup root
  -b, --backup-root <path>  Directory to pick archives from
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("DESCRIPTION:")}
  Extracts every entry of ARCHIVE into DESTINATION, creating directories
  as needed and overwriting existing files. Entries that would land
  outside DESTINATION abort the restore.

  Without ARCHIVE, you are prompted to pick one of the archives in the
  backup root. Without DESTINATION, you are prompted for it.

${color.dim("EXAMPLES:")}
  zipshot restore ./backups/backup_20240105_090307.zip ./restored
  zipshot restore                                  # Interactive
  zipshot restore -b /mnt/backups                  # Pick from another root
`);
}
