import extract from "extract-zip";
import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import path from "node:path";
import type { ManagerConfig } from "./config";
import type { Logger } from "./logger";
import { AppError, errorMessage, formatBytes, sleep } from "./utils";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type RetryOptions = {
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
};

type TextAnswer = { ok: true; text: string } | { ok: false; status: number; statusText: string };

export const ARCHIVE_FILENAME = "bedrock-server-latest.zip";

const globalFetch: FetchFn = (input, init) => fetch(input, init);

export class PackageFetcher {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(config: ManagerConfig, logger: Logger, fetchFn: FetchFn = globalFetch) {
    this.config = config;
    this.logger = logger;
    this.fetchFn = fetchFn;
  }

  /**
   * Issues a request and hands the response to `read`. The deadline covers both the
   * headers and whatever `read` consumes of the body.
   */
  async fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

    const headers = new Headers(init.headers);
    if (!headers.has("User-Agent")) {
      headers.set("User-Agent", this.config.download.userAgent);
    }

    try {
      const response = await this.fetchFn(url, {
        ...init,
        headers,
        signal: controller.signal,
      });
      return await read(response);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AppError("transfer", `Request timed out after ${Math.round(timeoutMs / 1000)} seconds: ${url}`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  /**
   * GETs a text resource, retrying network failures, timeouts and 5xx answers.
   * `retries` counts additional attempts after the first one.
   */
  async fetchText(url: string, options: RetryOptions): Promise<string> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= options.retries; attempt += 1) {
      if (attempt > 0) {
        this.logger.debug(`Retrying ${url} (attempt ${attempt + 1}/${options.retries + 1})`);
        await sleep(options.retryDelayMs ?? 1_000);
      }

      try {
        const readText = async (response: Response): Promise<TextAnswer> => {
          if (!response.ok) {
            await discardBody(response);
            return { ok: false, status: response.status, statusText: response.statusText };
          }
          return { ok: true, text: await response.text() };
        };
        const answer = await this.fetchWithTimeout(url, { method: "GET" }, options.timeoutMs, readText);
        if (answer.ok) {
          return answer.text;
        }

        lastError = new AppError("detection", `Request failed: ${answer.status} ${answer.statusText} (${url})`);
        if (answer.status < 500) {
          break;
        }
      } catch (error) {
        lastError = error;
      }
    }

    throw lastError instanceof Error ? lastError : new AppError("detection", `Request failed: ${url}`);
  }

  /** Lightweight reachability probe used before committing to a full download. */
  async validate(url: string): Promise<boolean> {
    const timeoutMs = this.config.download.probeTimeoutMs;
    try {
      const head = await this.fetchWithTimeout(url, { method: "HEAD", redirect: "follow" }, timeoutMs, async (response) => {
        await discardBody(response);
        return response;
      });
      if (head.ok) {
        return true;
      }

      if (head.status !== 405 && head.status !== 501) {
        this.logger.debug(`Download URL probe returned ${head.status} ${head.statusText}`);
        return false;
      }

      // Some CDNs refuse HEAD; ask for a single byte instead.
      return await this.fetchWithTimeout(
        url,
        { method: "GET", headers: { Range: "bytes=0-0" }, redirect: "follow" },
        timeoutMs,
        async (response) => {
          await discardBody(response);
          return response.ok;
        },
      );
    } catch (error) {
      this.logger.debug(`Download URL probe failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async download(url: string, stagingDir: string): Promise<string> {
    const destinationPath = path.join(stagingDir, ARCHIVE_FILENAME);
    this.logger.info(`Downloading Minecraft Bedrock Server from: ${url}`);

    await rm(destinationPath, { force: true });

    let downloadedBytes = 0;
    let totalBytes = 0;

    try {
      await this.fetchWithTimeout(url, { method: "GET" }, this.config.download.downloadTimeoutMs, async (response) => {
        if (!response.ok) {
          throw new AppError("transfer", `${response.status} ${response.statusText}`);
        }

        if (!response.body) {
          throw new AppError("transfer", "Download response body is empty.");
        }

        const contentLengthHeader = response.headers.get("content-length");
        // Transparent decoding makes content-length meaningless for progress and completeness.
        const encoded = response.headers.has("content-encoding");
        totalBytes = contentLengthHeader && !encoded ? Number(contentLengthHeader) : 0;
        downloadedBytes = await this.streamToFile(response.body, destinationPath, totalBytes);
      });
    } catch (error) {
      await rm(destinationPath, { force: true });
      throw new AppError("transfer", `Failed to download server from ${url}: ${errorMessage(error)}`);
    }

    if (totalBytes > 0 && downloadedBytes !== totalBytes) {
      await rm(destinationPath, { force: true });
      throw new AppError(
        "transfer",
        `Download incomplete: received ${formatBytes(downloadedBytes)} of ${formatBytes(totalBytes)}.`,
      );
    }

    this.logger.info("Download completed successfully");
    return destinationPath;
  }

  private async streamToFile(
    body: ReadableStream<Uint8Array>,
    destinationPath: string,
    totalBytes: number,
  ): Promise<number> {
    const writer = createWriteStream(destinationPath, { flags: "w" });
    const reader = body.getReader();
    let downloadedBytes = 0;
    let lastLogMs = Date.now();

    const logProgress = (force = false): void => {
      const now = Date.now();
      if (!force && now - lastLogMs < this.config.download.progressIntervalMs) {
        return;
      }

      if (totalBytes > 0) {
        const percent = ((downloadedBytes / totalBytes) * 100).toFixed(1);
        this.logger.info(`Download progress: ${formatBytes(downloadedBytes)} / ${formatBytes(totalBytes)} (${percent}%)`);
      } else {
        this.logger.info(`Download progress: ${formatBytes(downloadedBytes)}`);
      }
      lastLogMs = now;
    };

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }

        if (!value) {
          continue;
        }

        await writeToStream(writer, value);
        downloadedBytes += value.length;
        logProgress(false);
      }

      await endStream(writer);
      logProgress(true);
      return downloadedBytes;
    } catch (error) {
      writer.destroy();
      throw new AppError("transfer", `Download interrupted: ${errorMessage(error)}`);
    } finally {
      reader.releaseLock();
    }
  }

  async extract(archivePath: string, stagingDir: string): Promise<string> {
    const extractDir = path.join(stagingDir, "extracted");
    this.logger.info("Extracting server files...");

    await mkdir(extractDir, { recursive: true });

    try {
      await extract(archivePath, { dir: path.resolve(extractDir) });
    } catch (error) {
      throw new AppError("transfer", `Failed to extract server files: ${errorMessage(error)}`);
    }

    const size = (await stat(archivePath)).size;
    this.logger.info(`Server files extracted successfully (${formatBytes(size)} archive)`);
    return extractDir;
  }
}

/**
 * Runs `operation` inside a fresh staging directory under `root` and removes it afterwards,
 * whether the operation succeeded or threw.
 */
export async function withStagingDirectory<T>(
  root: string,
  logger: Logger,
  operation: (stagingDir: string) => Promise<T>,
): Promise<T> {
  await mkdir(root, { recursive: true });
  const stagingDir = await mkdtemp(path.join(root, "run-"));

  try {
    return await operation(stagingDir);
  } finally {
    logger.info("Cleaning up temporary files...");
    try {
      await rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(`Could not remove staging directory ${stagingDir}: ${errorMessage(error)}`);
    }
  }
}

async function discardBody(response: Response): Promise<void> {
  if (response.body) {
    await response.body.cancel().catch(() => undefined);
  }
}

async function writeToStream(writer: WriteStream, chunk: Uint8Array): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    writer.write(chunk, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function endStream(writer: WriteStream): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    writer.once("error", reject);
    writer.end(() => resolve());
  });
}
