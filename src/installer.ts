import { chmod, cp, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BackupEntry, BackupStore } from "./backups";
import type { ManagerConfig } from "./config";
import type { Logger } from "./logger";
import { type Account, chownRecursive } from "./system";
import { AppError, errorMessage, humanTimestamp, isDirectory, isFile, timestampId } from "./utils";
import { extractVersionFromText } from "./version";
import { METADATA_FILENAME } from "./version-resolver";

export type InstallRequest = {
  stagedDir: string;
  workDir: string;
  downloadUrl: string;
  now?: Date;
};

export type InstallResult = {
  version: string;
  backup: BackupEntry | null;
  preserved: string[];
};

export class InstallTransaction {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly backups: BackupStore;
  private readonly resolveOwner: () => Promise<Account | null>;

  constructor(
    config: ManagerConfig,
    logger: Logger,
    backups: BackupStore,
    resolveOwner: () => Promise<Account | null>,
  ) {
    this.config = config;
    this.logger = logger;
    this.backups = backups;
    this.resolveOwner = resolveOwner;
  }

  /**
   * Replaces the install directory with the staged package. The server must already be stopped.
   * Order: snapshot, preserve, purge, replace, restore, record metadata, fix permissions.
   */
  async install(request: InstallRequest): Promise<InstallResult> {
    const now = request.now ?? new Date();
    const serverDir = this.config.serverDir;

    if (!(await isFile(path.join(request.stagedDir, this.config.executable)))) {
      throw new AppError(
        "install",
        `Staged package does not contain ${this.config.executable}; refusing to replace the installed server.`,
      );
    }

    const backup = await this.backups.createBackup(now);

    const preserveDir = path.join(request.workDir, "preserve");
    const preserved = await this.preserve(preserveDir);

    this.logger.info("Installing new server files...");
    try {
      await mkdir(serverDir, { recursive: true });
      await this.purge(serverDir);
      await cp(request.stagedDir, serverDir, { recursive: true, force: true, verbatimSymlinks: true });

      if (preserved.length > 0) {
        await cp(preserveDir, serverDir, { recursive: true, force: true, preserveTimestamps: true });
        this.logger.info("Restored preserved files and world data");
      }
    } catch (error) {
      const hint = preserved.length > 0 ? ` Preserved files remain in ${preserveDir} until cleanup.` : "";
      throw new AppError("install", `Failed to install server files: ${errorMessage(error)}.${hint}`);
    }

    const version = await this.recordMetadata(request.downloadUrl, now);
    await this.fixPermissions();

    this.logger.info("New server installed successfully");
    return { version, backup, preserved };
  }

  async writeMetadata(version: string, downloadUrl: string, now = new Date()): Promise<void> {
    const content = [
      "# Minecraft Bedrock Server Version Information",
      "# This file is automatically generated by bedrock-manager",
      `VERSION=${version}`,
      `INSTALL_DATE=${humanTimestamp(now)}`,
      `DOWNLOAD_URL=${downloadUrl}`,
      "",
    ].join("\n");

    await writeFile(path.join(this.config.serverDir, METADATA_FILENAME), content, { encoding: "utf8", mode: 0o644 });
  }

  private async preserve(preserveDir: string): Promise<string[]> {
    const serverDir = this.config.serverDir;
    const preserved: string[] = [];

    this.logger.info("Preserving configuration files and world data...");
    await rm(preserveDir, { recursive: true, force: true });
    await mkdir(preserveDir, { recursive: true });

    for (const file of this.config.preserve.files) {
      const source = path.join(serverDir, file);
      if (await isFile(source)) {
        await mkdir(path.dirname(path.join(preserveDir, file)), { recursive: true });
        await cp(source, path.join(preserveDir, file), { preserveTimestamps: true });
        preserved.push(file);
        this.logger.debug(`Preserved: ${file}`);
      }
    }

    for (const directory of this.config.preserve.directories) {
      const source = path.join(serverDir, directory);
      if (await isDirectory(source)) {
        await cp(source, path.join(preserveDir, directory), {
          recursive: true,
          preserveTimestamps: true,
          verbatimSymlinks: true,
        });
        preserved.push(directory);
        this.logger.debug(`Preserved: ${directory}`);
      }
    }

    return preserved;
  }

  private async purge(serverDir: string): Promise<void> {
    for (const entry of await readdir(serverDir)) {
      await rm(path.join(serverDir, entry), { recursive: true, force: true });
    }
  }

  private async recordMetadata(downloadUrl: string, now: Date): Promise<string> {
    const version = extractVersionFromText(downloadUrl) ?? `unknown-${timestampId(now)}`;
    await this.writeMetadata(version, downloadUrl, now);
    this.logger.info(`Stored version information: ${version}`);
    return version;
  }

  private async fixPermissions(): Promise<void> {
    await chmod(path.join(this.config.serverDir, this.config.executable), 0o755);

    const owner = await this.resolveOwner();
    if (owner) {
      await chownRecursive(this.config.serverDir, owner);
    } else {
      this.logger.debug(`Skipping ownership change to ${this.config.serverUser} (not root or unknown account)`);
    }
  }
}
