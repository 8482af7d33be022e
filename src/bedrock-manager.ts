import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { type BackupEntry, BackupStore, type PruneResult } from "./backups";
import { type ManagerConfig, ensureDirectories } from "./config";
import { PackageFetcher, withStagingDirectory } from "./fetcher";
import { InstallTransaction } from "./installer";
import type { Logger } from "./logger";
import { type NotificationEvent, Notifier } from "./notifier";
import { type ProcessInfo, ScreenSession } from "./session";
import { Supervisor } from "./supervisor";
import { type Account, commandExists, isRoot, resolveAccount } from "./system";
import { AppError, directorySize, errorMessage, isDirectory, isFile } from "./utils";
import {
  type InstalledVersion,
  type UpdateDecision,
  type UpdateOutcome,
  decide,
  describeVersion,
} from "./version";
import { type InstallMetadata, type ResolvedRelease, VersionResolver } from "./version-resolver";

export type HostEnvironment = {
  isRoot(): boolean;
  commandExists(name: string): Promise<boolean>;
  resolveAccount(user: string): Promise<Account | null>;
};

export type ManagerComponents = {
  host: HostEnvironment;
  fetcher: PackageFetcher;
  resolver: VersionResolver;
  backups: BackupStore;
  installer: InstallTransaction;
  supervisor: Supervisor;
  notifier: Notifier;
};

export type CheckResult = {
  installed: InstalledVersion;
  release: ResolvedRelease;
  decision: UpdateDecision;
};

export type UpdateOptions = { force?: boolean };

export type UpdateReport = {
  outcome: UpdateOutcome;
  updated: boolean;
  forced: boolean;
  previousVersion: string;
  installedVersion: string | null;
  backup: BackupEntry | null;
  restarted: boolean;
};

export type StatusReport = {
  server: {
    running: boolean;
    session: string;
    process: ProcessInfo | null;
  };
  directory: {
    path: string;
    exists: boolean;
    executable: boolean;
    executableBit: boolean;
    worldCount: number;
    configFiles: string[];
    diskUsageBytes: number | null;
  };
  installed: InstalledVersion;
  metadata: InstallMetadata | null;
  backups: {
    count: number;
    totalBytes: number;
    recent: BackupEntry[];
  };
  log: {
    path: string;
    exists: boolean;
    sizeBytes: number;
    lineCount: number;
    tail: string[];
  };
};

type UpdatePhase = "validation" | "stop" | "download" | "extract" | "install";

const REQUIRED_TOOLS = ["screen", "pgrep"];
const CONFIG_FILES = ["server.properties", "allowlist.json", "permissions.json"];
const RECENT_BACKUPS = 5;
const LOG_TAIL_LINES = 10;

const defaultHost: HostEnvironment = { isRoot, commandExists, resolveAccount };

/**
 * Wires the components together and runs the operator-facing workflows.
 * Every component can be replaced, which is how the tests run without network or `screen`.
 */
export class BedrockManager {
  readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly host: HostEnvironment;
  readonly fetcher: PackageFetcher;
  readonly resolver: VersionResolver;
  readonly backups: BackupStore;
  readonly installer: InstallTransaction;
  readonly supervisor: Supervisor;
  readonly notifier: Notifier;

  constructor(config: ManagerConfig, logger: Logger, overrides: Partial<ManagerComponents> = {}) {
    this.config = config;
    this.logger = logger;
    this.host = overrides.host ?? defaultHost;

    const resolveOwner = async (): Promise<Account | null> => {
      return this.host.isRoot() ? this.host.resolveAccount(config.serverUser) : null;
    };

    this.fetcher = overrides.fetcher ?? new PackageFetcher(config, logger);
    this.resolver = overrides.resolver ?? new VersionResolver(config, logger, this.fetcher);
    this.backups = overrides.backups ?? new BackupStore(config, logger, resolveOwner);
    this.installer = overrides.installer ?? new InstallTransaction(config, logger, this.backups, resolveOwner);
    this.supervisor = overrides.supervisor ?? new Supervisor(config, logger, new ScreenSession(config, logger));
    this.notifier = overrides.notifier ?? new Notifier(config.notifications, logger);
  }

  async preflight(): Promise<void> {
    if (this.config.requireRoot && !this.host.isRoot()) {
      throw new AppError("environment", "This command must be run as root (use sudo).");
    }

    const missing: string[] = [];
    for (const tool of REQUIRED_TOOLS) {
      if (!(await this.host.commandExists(tool))) {
        missing.push(tool);
      }
    }

    if (missing.length > 0) {
      throw new AppError("environment", `Required tools are not installed: ${missing.join(", ")}`);
    }
  }

  async check(): Promise<CheckResult> {
    const installed = await this.resolver.installedVersion();
    this.logger.info(`Current installed version: ${describeVersion(installed)}`);

    const release = await this.resolver.latestRelease();
    this.logger.info(`Latest available version: ${describeVersion(release.latest)}`);

    const decision = decide(installed, release.latest);
    return { installed, release, decision };
  }

  async update(options: UpdateOptions = {}): Promise<UpdateReport> {
    this.logger.header("=== Minecraft Bedrock Server Update ===");
    const startedAt = new Date();
    await this.preflight();
    await ensureDirectories(this.config);

    const { installed, release, decision } = await this.check();
    const previousVersion = describeVersion(installed);
    const forced = !decision.updateNeeded && options.force === true && release.downloadUrl !== null;

    if (!decision.updateNeeded && !forced) {
      if (options.force) {
        this.logger.warn("--force ignored: no download URL could be determined");
      }
      this.logger.info(decision.reason);
      await this.notify("no-update", `${decision.reason} (installed: ${previousVersion})`);
      return {
        outcome: decision.outcome,
        updated: false,
        forced: false,
        previousVersion,
        installedVersion: null,
        backup: null,
        restarted: false,
      };
    }

    if (forced) {
      this.logger.warn(`Forcing update despite decision: ${decision.reason}`);
    } else {
      this.logger.info(decision.reason);
    }

    const downloadUrl = release.downloadUrl;
    if (!downloadUrl) {
      const error = new AppError("detection", "No download URL is available for the latest server build.");
      await this.notify("update-failure", `Update failed during detection: ${error.message}`);
      throw error;
    }

    const target = describeVersion(release.latest);
    await this.notify("update-start", `Updating server from ${previousVersion} to ${target}`);

    let phase: UpdatePhase = "validation";

    try {
      this.logger.info("Validating download URL...");
      if (!(await this.fetcher.validate(downloadUrl))) {
        throw new AppError("detection", `Download URL is not reachable: ${downloadUrl}`);
      }

      const { result, wasRunning } = await withStagingDirectory(this.config.tempDir, this.logger, async (stagingDir) => {
        phase = "stop";
        const running = await this.supervisor.isRunning();
        if (running) {
          this.logger.info("Server is running, stopping it for the update...");
          await this.supervisor.stop();
        }

        phase = "download";
        const archivePath = await this.fetcher.download(downloadUrl, stagingDir);

        phase = "extract";
        const stagedDir = await this.fetcher.extract(archivePath, stagingDir);

        phase = "install";
        const installed = await this.installer.install({ stagedDir, workDir: stagingDir, downloadUrl });
        return { result: installed, wasRunning: running };
      });

      // The sweep is measured from this run's own snapshot, so that snapshot always survives it.
      const sweepReference = result.backup ? result.backup.modifiedAt : startedAt;
      try {
        await this.backups.pruneBackups(this.config.backup.retentionDays, sweepReference);
      } catch (error) {
        this.logger.warn(`Could not clean up old backups: ${errorMessage(error)}`);
      }

      this.logger.info(`Update completed successfully: ${previousVersion} -> ${result.version}`);
      await this.notify("update-success", `Server updated from ${previousVersion} to ${result.version}`);

      const restarted = wasRunning ? await this.restartAfterUpdate() : false;
      return {
        outcome: decision.outcome,
        updated: true,
        forced,
        previousVersion,
        installedVersion: result.version,
        backup: result.backup,
        restarted,
      };
    } catch (error) {
      this.logger.error(`Update failed during ${phase}: ${errorMessage(error)}`);
      await this.notify("update-failure", `Update failed during ${phase}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async backupNow(): Promise<BackupEntry | null> {
    await ensureDirectories(this.config);
    return this.backups.createBackup();
  }

  listBackups(): Promise<BackupEntry[]> {
    return this.backups.listBackups();
  }

  cleanupBackups(retentionDays?: number): Promise<PruneResult> {
    return this.backups.pruneBackups(retentionDays);
  }

  async statusReport(): Promise<StatusReport> {
    const running = await this.supervisor.isRunning();
    const processInfo = running ? await this.supervisor.processInfo() : null;
    const backups = await this.backups.listBackups();

    return {
      server: { running, session: this.config.sessionName, process: processInfo },
      directory: await this.describeDirectory(),
      installed: await this.resolver.installedVersion(),
      metadata: await this.resolver.readInstallMetadata(),
      backups: {
        count: backups.length,
        totalBytes: backups.reduce((sum, backup) => sum + backup.size, 0),
        recent: backups.slice(0, RECENT_BACKUPS),
      },
      log: await this.describeLog(),
    };
  }

  private async restartAfterUpdate(): Promise<boolean> {
    this.logger.info("Restarting server...");
    try {
      await this.supervisor.start();
      return true;
    } catch (error) {
      this.logger.error(`Failed to restart server after update: ${errorMessage(error)}`);
      return false;
    }
  }

  private async notify(event: NotificationEvent, message: string): Promise<void> {
    try {
      await this.notifier.notify(event, message);
    } catch (error) {
      this.logger.warn(`Notification failed: ${errorMessage(error)}`);
    }
  }

  private async describeDirectory(): Promise<StatusReport["directory"]> {
    const serverDir = this.config.serverDir;
    const exists = await isDirectory(serverDir);
    const executablePath = path.join(serverDir, this.config.executable);
    const executable = exists && (await isFile(executablePath));
    const executableBit = executable && ((await stat(executablePath)).mode & 0o111) !== 0;

    let worldCount = 0;
    const worldsDir = path.join(serverDir, "worlds");
    if (await isDirectory(worldsDir)) {
      const entries = await readdir(worldsDir, { withFileTypes: true });
      worldCount = entries.filter((entry) => entry.isDirectory()).length;
    }

    const configFiles: string[] = [];
    for (const file of CONFIG_FILES) {
      if (await isFile(path.join(serverDir, file))) {
        configFiles.push(file);
      }
    }

    return {
      path: serverDir,
      exists,
      executable,
      executableBit,
      worldCount,
      configFiles,
      diskUsageBytes: exists ? await directorySize(serverDir) : null,
    };
  }

  private async describeLog(): Promise<StatusReport["log"]> {
    const logFile = this.config.logFile;
    if (!(await isFile(logFile))) {
      return { path: logFile, exists: false, sizeBytes: 0, lineCount: 0, tail: [] };
    }

    const content = await readFile(logFile, "utf8");
    const lines = content.split("\n");
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }

    return {
      path: logFile,
      exists: true,
      sizeBytes: Buffer.byteLength(content),
      lineCount: lines.length,
      tail: lines.slice(-LOG_TAIL_LINES),
    };
  }
}
