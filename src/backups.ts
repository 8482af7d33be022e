import { cp, mkdir, readdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import * as tar from "tar";
import type { ManagerConfig } from "./config";
import type { Logger } from "./logger";
import { type Account, chownRecursive } from "./system";
import { AppError, errorMessage, formatBytes, isDirectory, timestampId } from "./utils";

export type BackupEntry = {
  name: string;
  path: string;
  size: number;
  modifiedAt: Date;
};

export type PruneResult = {
  removed: string[];
  kept: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export class BackupStore {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly resolveOwner: () => Promise<Account | null>;

  constructor(config: ManagerConfig, logger: Logger, resolveOwner: () => Promise<Account | null>) {
    this.config = config;
    this.logger = logger;
    this.resolveOwner = resolveOwner;
  }

  archiveName(date = new Date()): string {
    return `${this.config.backup.prefix}-${timestampId(date)}.tar.gz`;
  }

  /**
   * Snapshots the whole install directory into `<backupDir>/<prefix>-YYYYMMDD-HHMMSS.tar.gz`.
   * Returns null when there is nothing installed to back up.
   */
  async createBackup(now = new Date()): Promise<BackupEntry | null> {
    const serverDir = this.config.serverDir;
    if (!(await isDirectory(serverDir)) || (await readdir(serverDir)).length === 0) {
      this.logger.info("No existing server directory found, skipping backup");
      return null;
    }

    const archiveName = this.archiveName(now);
    const copyName = archiveName.replace(/\.tar\.gz$/, "");
    const copyPath = path.join(this.config.backupDir, copyName);
    const archivePath = path.join(this.config.backupDir, archiveName);

    this.logger.info(`Creating backup: ${copyName}`);
    await mkdir(this.config.backupDir, { recursive: true });

    try {
      await rm(copyPath, { recursive: true, force: true });
      await cp(serverDir, copyPath, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });

      this.logger.info("Compressing backup...");
      await tar.create({ gzip: true, file: archivePath, cwd: this.config.backupDir, portable: false }, [copyName]);
    } catch (error) {
      await rm(archivePath, { force: true });
      throw new AppError("install", `Failed to create backup: ${errorMessage(error)}`);
    } finally {
      await rm(copyPath, { recursive: true, force: true });
    }

    const owner = await this.resolveOwner();
    if (owner) {
      await chownRecursive(archivePath, owner);
    }

    const archiveStats = await stat(archivePath);
    this.logger.info(`Backup created successfully: ${archiveName} (${formatBytes(archiveStats.size)})`);
    return { name: archiveName, path: archivePath, size: archiveStats.size, modifiedAt: archiveStats.mtime };
  }

  /** Managed archives, newest first. */
  async listBackups(): Promise<BackupEntry[]> {
    if (!(await isDirectory(this.config.backupDir))) {
      return [];
    }

    const pattern = this.archivePattern();
    const entries = await readdir(this.config.backupDir, { withFileTypes: true });
    const backups: BackupEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || !pattern.test(entry.name)) {
        continue;
      }

      const fullPath = path.join(this.config.backupDir, entry.name);
      const fileStats = await stat(fullPath);
      backups.push({ name: entry.name, path: fullPath, size: fileStats.size, modifiedAt: fileStats.mtime });
    }

    backups.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
    return backups;
  }

  /** Deletes archives whose modification time is older than the retention window. */
  async pruneBackups(retentionDays = this.config.backup.retentionDays, now = new Date()): Promise<PruneResult> {
    this.logger.info(`Cleaning up old backups (older than ${retentionDays} days)...`);

    const cutoff = now.getTime() - retentionDays * DAY_MS;
    const removed: string[] = [];
    let kept = 0;

    for (const backup of await this.listBackups()) {
      if (backup.modifiedAt.getTime() < cutoff) {
        await rm(backup.path, { force: true });
        removed.push(backup.name);
        this.logger.debug(`Removed old backup: ${backup.name}`);
      } else {
        kept += 1;
      }
    }

    this.logger.info(`Old backups cleaned up (${removed.length} removed, ${kept} kept)`);
    return { removed, kept };
  }

  private archivePattern(): RegExp {
    const prefix = this.config.backup.prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    return new RegExp(`^${prefix}-\\d{8}-\\d{6}\\.tar\\.gz$`);
  }
}
