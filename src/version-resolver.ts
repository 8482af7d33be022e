import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { ManagerConfig } from "./config";
import type { PackageFetcher } from "./fetcher";
import type { Logger } from "./logger";
import { dateStamp, errorMessage, isFile } from "./utils";
import {
  type InstalledVersion,
  type LatestVersion,
  extractVersionFromText,
  knownVersion,
} from "./version";

export const METADATA_FILENAME = ".installed_version";
export const RELEASE_NOTES_FILENAME = "release-notes.txt";

export type InstallMetadata = {
  version: string;
  installDate: string | null;
  downloadUrl: string | null;
};

export type ReleaseSource = "api" | "scrape" | "configured";

export type ResolvedRelease = {
  latest: LatestVersion;
  downloadUrl: string | null;
  source: ReleaseSource;
};

export function parseMetadataFile(raw: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const separator = trimmed.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    values[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
  }
  return values;
}

export function isUsableDownloadUrl(value: unknown): value is string {
  if (typeof value !== "string") {
    return false;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== "null" && /^https?:\/\//.test(trimmed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

// Expects `{ result: { links: [{ downloadType, downloadUrl }, ...] } }`.
export function findLinuxDownloadUrl(payload: unknown, downloadType: string): string | null {
  const result = isRecord(payload) ? payload.result : undefined;
  const links: unknown = isRecord(result) ? result.links : undefined;
  if (!Array.isArray(links)) {
    return null;
  }

  const entries: unknown[] = links;
  for (const entry of entries) {
    if (isRecord(entry) && entry.downloadType === downloadType) {
      const url = entry.downloadUrl;
      return isUsableDownloadUrl(url) ? url.trim() : null;
    }
  }

  return null;
}

export class VersionResolver {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly fetcher: PackageFetcher;

  constructor(config: ManagerConfig, logger: Logger, fetcher: PackageFetcher) {
    this.config = config;
    this.logger = logger;
    this.fetcher = fetcher;
  }

  metadataPath(): string {
    return path.join(this.config.serverDir, METADATA_FILENAME);
  }

  async readInstallMetadata(): Promise<InstallMetadata | null> {
    let raw: string;
    try {
      raw = await readFile(this.metadataPath(), "utf8");
    } catch {
      return null;
    }

    const values = parseMetadataFile(raw);
    if (!values.VERSION) {
      return null;
    }

    return {
      version: values.VERSION,
      installDate: values.INSTALL_DATE || null,
      downloadUrl: values.DOWNLOAD_URL || null,
    };
  }

  async installedVersion(): Promise<InstalledVersion> {
    const executablePath = path.join(this.config.serverDir, this.config.executable);
    if (!(await isFile(executablePath))) {
      return { kind: "not-installed" };
    }

    const metadata = await this.readInstallMetadata();
    if (metadata) {
      return knownVersion(metadata.version);
    }

    const fromNotes = await this.readReleaseNotesVersion();
    if (fromNotes) {
      return knownVersion(fromNotes);
    }

    try {
      const executableStats = await stat(executablePath);
      return knownVersion(`installed-${dateStamp(executableStats.mtime)}`);
    } catch {
      return { kind: "unresolved" };
    }
  }

  async latestRelease(): Promise<ResolvedRelease> {
    this.logger.info("Detecting latest Minecraft Bedrock server version...");

    const fromApi = await this.resolveFromApi();
    if (fromApi) {
      return fromApi;
    }

    const fromPage = await this.resolveFromDownloadPage();
    if (fromPage) {
      return fromPage;
    }

    return this.resolveFromConfiguredUrl();
  }

  private async readReleaseNotesVersion(): Promise<string | null> {
    try {
      const notes = await readFile(path.join(this.config.serverDir, RELEASE_NOTES_FILENAME), "utf8");
      return notes.match(/Version\s+(\d+\.\d+\.\d+\.\d+)/)?.[1] ?? null;
    } catch {
      return null;
    }
  }

  private async resolveFromApi(): Promise<ResolvedRelease | null> {
    const { linksApiUrl, linuxDownloadType, requestTimeoutMs, requestRetries } = this.config.download;
    this.logger.debug("Fetching download links from official Minecraft API...");

    let raw: string;
    try {
      raw = await this.fetcher.fetchText(linksApiUrl, { timeoutMs: requestTimeoutMs, retries: requestRetries });
    } catch (error) {
      this.logger.warn(`Failed to fetch from official Minecraft API: ${errorMessage(error)}`);
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.logger.warn("Official Minecraft API returned malformed JSON");
      return null;
    }

    const downloadUrl = findLinuxDownloadUrl(payload, linuxDownloadType);
    if (!downloadUrl) {
      this.logger.debug(`No usable ${linuxDownloadType} download URL in API response`);
      return null;
    }

    const version = extractVersionFromText(downloadUrl);
    this.logger.info(`Found latest version using API: ${version ?? "unknown"}`);
    return {
      latest: version ? knownVersion(version) : { kind: "unresolved" },
      downloadUrl,
      source: "api",
    };
  }

  private async resolveFromDownloadPage(): Promise<ResolvedRelease | null> {
    const { pageUrl, cdnUrlTemplate, requestTimeoutMs, requestRetries } = this.config.download;
    this.logger.debug("API method failed, falling back to website scraping...");

    let page: string;
    try {
      page = await this.fetcher.fetchText(pageUrl, { timeoutMs: requestTimeoutMs, retries: requestRetries });
    } catch (error) {
      this.logger.warn(`Failed to fetch version from official website: ${errorMessage(error)}`);
      return null;
    }

    const version = extractVersionFromText(page);
    if (!version) {
      this.logger.debug("No version found in website content");
      return null;
    }

    this.logger.info(`Found latest version from website scraping: ${version}`);
    return {
      latest: knownVersion(version),
      downloadUrl: cdnUrlTemplate.replace("{version}", version),
      source: "scrape",
    };
  }

  private resolveFromConfiguredUrl(): ResolvedRelease {
    const { fallbackUrl } = this.config.download;
    this.logger.warn("Could not automatically detect latest version using any method");
    this.logger.info("Falling back to configured download URL");

    const version = extractVersionFromText(fallbackUrl);
    if (version) {
      this.logger.info(`Using configured version: ${version}`);
    }

    return {
      latest: version ? knownVersion(version) : { kind: "unresolved" },
      downloadUrl: isUsableDownloadUrl(fallbackUrl) ? fallbackUrl.trim() : null,
      source: "configured",
    };
  }
}
