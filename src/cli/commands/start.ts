import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { toBackupConfig } from "../../config/resolver";
import { BackupService, errorMessage, InvalidConfigError } from "../../core";
import { logger, setLogLevel } from "../../utils/logger";
import { resolveCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
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
    const config = await resolveCommandConfig(values);
    if (!config) {
      return 1;
    }

    ui.banner("start");

    const backupConfig = toBackupConfig(config);
    ui.note(
      formatSummary([
        { label: "Source", value: backupConfig.sourceRoot },
        { label: "Backup root", value: backupConfig.backupRoot },
        { label: "Interval", value: `${backupConfig.intervalMinutes} minute(s)` },
        { label: "Compression", value: backupConfig.compression },
      ]),
      "Backup session",
    );

    const service = new BackupService();
    await service.start(backupConfig, (message) => logger.info(message));

    // Handle shutdown signals; the pass in flight is allowed to finish
    let stopping = false;
    const shutdown = () => {
      if (stopping) return;
      stopping = true;

      ui.cancel("Shutting down...");
      service.stop();
      service.whenIdle().then(
        () => process.exit(0),
        () => process.exit(1),
      );
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    ui.success("Backups are running");
    ui.info("Press Ctrl+C to stop");

    // Keep the process running until a signal arrives
    await new Promise<never>(() => {});

    return 0;
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      ui.error(`Invalid configuration: ${error.message}`);
    } else {
      ui.error(`Failed to start: ${errorMessage(error)}`);
    }
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("zipshot start")} - Start scheduled incremental backups

${color.dim("USAGE:")}
  zipshot start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./zipshot.config.yaml)
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
  -s, --source <path>       Directory to back up
  -b, --backup-root <path>  Directory archives are written to
  -i, --interval <minutes>  Minutes between passes (default: 30)
      --compression <0-9>   Compression level (default: 6)

${color.dim("DESCRIPTION:")}
  Runs a backup pass immediately and then every interval. The first pass
  archives every file in the source; later passes archive only files
  modified since the previous pass. A pass with nothing to archive writes
  no archive. Archives are named backup_yyyyMMdd_HHmmss.zip.

  If a pass is still running when the next one is due, that tick is
  skipped. The "last backup" time is kept in memory only: restarting the
  process starts again with a full backup.

${color.dim("EXAMPLES:")}
  zipshot start                                  # Start with ./zipshot.config.yaml
  zipshot start -c /etc/zipshot.yaml             # Start with specific config
  zipshot start -s ./data -b ./backups -i 15     # No config file
`);
}
