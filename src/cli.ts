import { Command, CommanderError, InvalidArgumentError } from "commander";
import { version } from "../package.json";
import { BedrockManager, type StatusReport } from "./bedrock-manager";
import { type ManagerConfig, loadConfig } from "./config";
import { type LogSink, Logger } from "./logger";
import { AppError, errorMessage, formatBytes, humanTimestamp } from "./utils";
import { checkExitCode, describeVersion } from "./version";

export type CliDependencies = {
  env?: Record<string, string | undefined>;
  sink?: LogSink;
  createManager?: (config: ManagerConfig, logger: Logger) => BedrockManager;
};

type Context = { config: ManagerConfig; logger: Logger; manager: BedrockManager };

function parseDays(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number of days.");
  }
  return value;
}

function printStatus(logger: Logger, report: StatusReport): void {
  logger.header("=== Minecraft Bedrock Server Status ===");
  logger.blank();

  logger.header("Server:");
  if (report.server.running) {
    logger.info(`Status: RUNNING (session: ${report.server.session})`);
    const info = report.server.process;
    if (info) {
      logger.info(`PID: ${info.pid}`);
      logger.info(`Memory: ${info.memoryMb} MB`);
      logger.info(`CPU: ${info.cpuPercent}%`);
      logger.info(`Started: ${info.startedAt}`);
    }
  } else {
    logger.warn("Status: STOPPED");
  }
  logger.info(`Installed version: ${describeVersion(report.installed)}`);
  if (report.metadata?.installDate) {
    logger.info(`Installed on: ${report.metadata.installDate}`);
  }
  logger.blank();

  const directory = report.directory;
  logger.header("Directory:");
  if (!directory.exists) {
    logger.warn(`Server directory not found: ${directory.path}`);
  } else {
    logger.info(`Path: ${directory.path}`);
    logger.info(`Executable: ${directory.executable ? (directory.executableBit ? "present" : "present (not executable)") : "missing"}`);
    logger.info(`Worlds: ${directory.worldCount}`);
    logger.info(`Config files: ${directory.configFiles.length > 0 ? directory.configFiles.join(", ") : "none"}`);
    if (directory.diskUsageBytes !== null) {
      logger.info(`Disk usage: ${formatBytes(directory.diskUsageBytes)}`);
    }
  }
  logger.blank();

  logger.header("Backups:");
  logger.info(`Count: ${report.backups.count} (${formatBytes(report.backups.totalBytes)})`);
  for (const backup of report.backups.recent) {
    logger.info(`  ${backup.name}  ${formatBytes(backup.size)}  ${humanTimestamp(backup.modifiedAt)}`);
  }
  logger.blank();

  logger.header("Log:");
  if (!report.log.exists) {
    logger.info(`No log file at ${report.log.path}`);
    return;
  }
  logger.info(`${report.log.path} (${formatBytes(report.log.sizeBytes)}, ${report.log.lineCount} lines)`);
  for (const line of report.log.tail) {
    logger.info(`  ${line}`);
  }
}

/** Parses `argv` (without the node and script entries), runs the command and resolves the exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const createManager = deps.createManager ?? ((config, logger) => new BedrockManager(config, logger));
  const state: { exitCode: number; context: Context | null } = { exitCode: 0, context: null };

  const program = new Command();

  const resolveContext = (): Context => {
    if (!state.context) {
      const config = loadConfig(env);
      const verbose = program.opts<{ verbose?: boolean }>().verbose === true || config.logLevel === "debug";
      const logger = new Logger({ logFile: config.logFile, verbose, sink: deps.sink });
      state.context = { config, logger, manager: createManager(config, logger) };
    }
    return state.context;
  };

  program
    .name("bedrock-manager")
    .description("Install, update, back up and supervise a Minecraft Bedrock dedicated server")
    .version(version)
    .option("-v, --verbose", "print debug output")
    .exitOverride();

  program
    .command("status", { isDefault: true })
    .description("show server, directory, backup and log status")
    .action(async () => {
      const { logger, manager } = resolveContext();
      printStatus(logger, await manager.statusReport());
    });

  program
    .command("start")
    .description("start the server in its screen session")
    .action(async () => {
      const { manager } = resolveContext();
      await manager.supervisor.start();
    });

  program
    .command("stop")
    .description("stop the server, warning players and saving the world first")
    .option("-f, --force", "terminate the process without warnings or save")
    .action(async (options: { force?: boolean }) => {
      const { manager } = resolveContext();
      await manager.supervisor.stop({ force: options.force === true });
    });

  program
    .command("restart")
    .description("stop and start the server")
    .action(async () => {
      const { manager } = resolveContext();
      await manager.supervisor.restart();
    });

  program
    .command("update")
    .description("install the latest server build when it is newer than the installed one")
    .option("-f, --force", "reinstall even when no update is needed")
    .action(async (options: { force?: boolean }) => {
      const { manager } = resolveContext();
      await manager.update({ force: options.force === true });
    });

  program
    .command("check")
    .description("compare the installed and latest versions (exit 0 current, 1 unknown, 2 update, 3 newer)")
    .option("-d, --detailed", "also print where the latest version was found")
    .action(async (options: { detailed?: boolean }) => {
      const { logger, manager } = resolveContext();
      const result = await manager.check();

      if (options.detailed) {
        logger.info(`Detection method: ${result.release.source}`);
        logger.info(`Download URL: ${result.release.downloadUrl ?? "none"}`);
        logger.info(`Outcome: ${result.decision.outcome}`);
      }

      if (result.decision.outcome === "installed-newer") {
        logger.warn(result.decision.reason);
      } else {
        logger.info(result.decision.reason);
      }
      state.exitCode = checkExitCode(result.decision);
    });

  program
    .command("console")
    .alias("connect")
    .description("attach to the server console (Ctrl+A, D to detach)")
    .action(async () => {
      const { manager } = resolveContext();
      state.exitCode = await manager.supervisor.attach();
    });

  program
    .command("command")
    .alias("cmd")
    .argument("<line...>", "console command to send")
    .description("send a console command to the running server")
    .action(async (line: string[]) => {
      const { manager } = resolveContext();
      await manager.supervisor.sendCommand(line.join(" "));
    });

  program
    .command("backup")
    .description("snapshot the server directory now")
    .action(async () => {
      const { logger, manager } = resolveContext();
      const backup = await manager.backupNow();
      if (!backup) {
        logger.warn("Nothing to back up");
      }
    });

  program
    .command("backups")
    .description("list backup archives, newest first")
    .action(async () => {
      const { logger, manager } = resolveContext();
      const backups = await manager.listBackups();
      if (backups.length === 0) {
        logger.info("No backups found");
        return;
      }
      for (const backup of backups) {
        logger.info(`${backup.name}  ${formatBytes(backup.size)}  ${humanTimestamp(backup.modifiedAt)}`);
      }
    });

  program
    .command("cleanup-backups")
    .description("delete backups older than the retention window")
    .option("--days <n>", "override the retention window", parseDays)
    .action(async (options: { days?: number }) => {
      const { manager } = resolveContext();
      await manager.cleanupBackups(options.days);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const logger = state.context?.logger ?? new Logger({ sink: deps.sink });
    logger.error(error instanceof AppError ? error.message : `Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}
