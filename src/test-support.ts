import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach } from "vitest";
import { type ManagerConfig, loadConfig } from "./config";
import { type FetchFn, PackageFetcher } from "./fetcher";
import { Logger, MemoryLogSink } from "./logger";
import type { ProcessInfo, ProcessSignal, SessionBackend } from "./session";
import { AppError } from "./utils";

/** Creates temp directories that are removed after each test. */
export function useTempDirs(): (prefix?: string) => Promise<string> {
  const created: string[] = [];

  afterEach(async () => {
    await Promise.all(created.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  return async (prefix = "bedrock-test-") => {
    const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
    created.push(dir);
    return dir;
  };
}

export function makeTestConfig(root: string, env: Record<string, string> = {}): ManagerConfig {
  return loadConfig(testEnv(root, env));
}

export function testEnv(root: string, env: Record<string, string> = {}): Record<string, string> {
  return {
    BEDROCK_MANAGER_CWD: root,
    BEDROCK_SERVER_DIR: "server",
    BEDROCK_BACKUP_DIR: "backups",
    BEDROCK_TEMP_DIR: "tmp",
    LOG_DIR: "logs",
    BEDROCK_SERVER_USER: "mcserver",
    BEDROCK_REQUIRE_ROOT: "false",
    BEDROCK_REQUEST_RETRIES: "0",
    BEDROCK_START_SETTLE_MS: "0",
    BEDROCK_RESTART_DELAY_MS: "0",
    ...env,
  };
}

export function testLogger(): { logger: Logger; sink: MemoryLogSink } {
  const sink = new MemoryLogSink();
  return { logger: new Logger({ sink, verbose: true }), sink };
}

export const noWait = async (): Promise<void> => undefined;

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, "utf8");
  }
}

export async function installFakeServer(config: ManagerConfig, files: Record<string, string> = {}): Promise<void> {
  await writeTree(config.serverDir, { [config.executable]: "#!/bin/sh\n", ...files });
  await chmod(path.join(config.serverDir, config.executable), 0o755);
}

type Route = Response | Error | (() => Response);

export type StubbedFetch = FetchFn & { calls: { url: string; method: string }[] };

/** A `fetch` that answers from a URL table; unknown URLs get a 404. */
export function stubFetch(routes: Record<string, Route>): StubbedFetch {
  const calls: { url: string; method: string }[] = [];
  const fn = async (input: string, init?: RequestInit): Promise<Response> => {
    calls.push({ url: input, method: init?.method ?? "GET" });
    const route = routes[input];
    if (route === undefined) {
      return new Response("not found", { status: 404, statusText: "Not Found" });
    }
    if (route instanceof Error) {
      throw route;
    }
    return typeof route === "function" ? route() : route.clone();
  };
  return Object.assign(fn, { calls });
}

export type FakeSessionOptions = {
  exitOnStop?: boolean;
  survivesTerm?: boolean;
  launchFails?: boolean;
  diesOnLaunch?: boolean;
  inputFails?: boolean;
};

/** In-process stand-in for a screen session hosting the server. */
export class FakeSession implements SessionBackend {
  session = false;
  process = false;
  readonly lines: string[] = [];
  readonly signals: ProcessSignal[] = [];
  launches = 0;
  quits = 0;
  attaches = 0;
  private readonly options: FakeSessionOptions;

  constructor(options: FakeSessionOptions = {}) {
    this.options = options;
  }

  running(): this {
    this.session = true;
    this.process = true;
    return this;
  }

  describe(): string {
    return 'screen session "test"';
  }

  async sessionExists(): Promise<boolean> {
    return this.session;
  }

  async processExists(): Promise<boolean> {
    return this.process;
  }

  async launch(): Promise<void> {
    this.launches += 1;
    if (this.options.launchFails) {
      throw new AppError("supervision", "screen refused to start");
    }
    this.session = true;
    this.process = !this.options.diesOnLaunch;
  }

  async stuff(line: string): Promise<void> {
    if (this.options.inputFails) {
      throw new AppError("supervision", "screen did not accept input");
    }
    this.lines.push(line);
    if (line === "stop" && this.options.exitOnStop !== false) {
      this.process = false;
      this.session = false;
    }
  }

  async quit(): Promise<void> {
    this.quits += 1;
    this.session = false;
  }

  async signalProcess(signal: ProcessSignal): Promise<void> {
    this.signals.push(signal);
    if (signal === "KILL" || !this.options.survivesTerm) {
      this.process = false;
    }
  }

  async processInfo(): Promise<ProcessInfo | null> {
    return this.process ? { pid: 4242, memoryMb: 512, cpuPercent: 12.5, startedAt: "Mon Jan  6 10:00:00 2025" } : null;
  }

  async attach(): Promise<number> {
    this.attaches += 1;
    return 0;
  }
}

export type StubPackage = {
  files: Record<string, string>;
  reachable?: boolean;
  failAt?: "download" | "extract";
};

/** A fetcher whose "download" writes a fixed staged package instead of touching the network. */
export class StubFetcher extends PackageFetcher {
  readonly stagingDirs: string[] = [];
  readonly downloads: string[] = [];
  private readonly pkg: StubPackage;

  constructor(config: ManagerConfig, logger: Logger, pkg: StubPackage, fetchFn: FetchFn = stubFetch({})) {
    super(config, logger, fetchFn);
    this.pkg = pkg;
  }

  async validate(): Promise<boolean> {
    return this.pkg.reachable ?? true;
  }

  async download(url: string, stagingDir: string): Promise<string> {
    this.downloads.push(url);
    this.stagingDirs.push(stagingDir);
    if (this.pkg.failAt === "download") {
      throw new AppError("transfer", "Download interrupted: connection reset");
    }
    const archivePath = path.join(stagingDir, "bedrock-server-latest.zip");
    await writeFile(archivePath, "zip");
    return archivePath;
  }

  async extract(_archivePath: string, stagingDir: string): Promise<string> {
    if (this.pkg.failAt === "extract") {
      throw new AppError("transfer", "Failed to extract server files: invalid archive");
    }
    const extractDir = path.join(stagingDir, "extracted");
    await writeTree(extractDir, this.pkg.files);
    return extractDir;
  }
}
