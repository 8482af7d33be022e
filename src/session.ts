import { spawn } from "node:child_process";
import type { ManagerConfig } from "./config";
import type { Logger } from "./logger";
import { type CommandOptions, type CommandResult, isRoot, runCommandCapture } from "./system";
import { AppError } from "./utils";

export type ProcessSignal = "TERM" | "KILL";

export type ProcessInfo = {
  pid: number;
  memoryMb: number;
  cpuPercent: number;
  startedAt: string;
};

/**
 * A detached terminal session that hosts the server process. Probes answer "no" on any
 * failure; only `launch` reports errors.
 */
export type SessionBackend = {
  sessionExists(): Promise<boolean>;
  processExists(): Promise<boolean>;
  launch(cwd: string, executable: string): Promise<void>;
  stuff(line: string): Promise<void>;
  quit(): Promise<void>;
  signalProcess(signal: ProcessSignal): Promise<void>;
  processInfo(): Promise<ProcessInfo | null>;
  describe(): string;
  attach(): Promise<number>;
};

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export function parsePsLine(line: string, pid: number): ProcessInfo | null {
  const match = line.trim().match(/^(\d+)\s+([\d.]+)\s+(.+)$/);
  if (!match) {
    return null;
  }

  return {
    pid,
    memoryMb: Math.round(Number(match[1]) / 1024),
    cpuPercent: Number(match[2]),
    startedAt: match[3].trim(),
  };
}

export class ScreenSession implements SessionBackend {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly run: CommandRunner;
  private readonly elevated: boolean;

  constructor(config: ManagerConfig, logger: Logger, run: CommandRunner = runCommandCapture, elevated = isRoot()) {
    this.config = config;
    this.logger = logger;
    this.run = run;
    this.elevated = elevated;
  }

  describe(): string {
    return `screen session "${this.config.sessionName}"`;
  }

  async sessionExists(): Promise<boolean> {
    const result = await this.screen(["-list"]);
    // `screen -list` exits non-zero even when sessions exist on some builds; trust the listing.
    const pattern = new RegExp(`^\\s*\\d+\\.${escapeRegExp(this.config.sessionName)}\\s`, "m");
    return !result.timedOut && pattern.test(result.stdout);
  }

  async processExists(): Promise<boolean> {
    return (await this.findPid()) !== null;
  }

  async launch(cwd: string, executable: string): Promise<void> {
    const script = `cd ${shellQuote(cwd)} && LD_LIBRARY_PATH=. ./${shellQuote(executable)}`;
    const result = await this.screen(["-dmS", this.config.sessionName, "bash", "-c", script], cwd);

    if (result.code !== 0) {
      throw new AppError("supervision", `Failed to create ${this.describe()}: ${result.stderr.trim() || `exit ${result.code}`}`);
    }
  }

  async stuff(line: string): Promise<void> {
    const result = await this.screen(["-S", this.config.sessionName, "-p", "0", "-X", "stuff", `${line}\n`]);
    if (result.code !== 0) {
      throw new AppError(
        "supervision",
        `Failed to send input to ${this.describe()}: ${result.stderr.trim() || `exit ${result.code}`}`,
      );
    }
  }

  async quit(): Promise<void> {
    const result = await this.screen(["-S", this.config.sessionName, "-X", "quit"]);
    if (result.code !== 0) {
      this.logger.debug(`screen quit exited with ${result.code}: ${result.stderr.trim()}`);
    }
  }

  async signalProcess(signal: ProcessSignal): Promise<void> {
    const result = await this.run("pkill", [`-${signal}`, "-u", this.config.serverUser, "-f", this.config.executable], {
      timeoutMs: this.config.supervisor.probeCommandTimeoutMs,
    });
    this.logger.debug(`pkill -${signal} exited with ${result.code}`);
  }

  async processInfo(): Promise<ProcessInfo | null> {
    const pid = await this.findPid();
    if (pid === null) {
      return null;
    }

    const result = await this.run("ps", ["-p", String(pid), "-o", "rss=,%cpu=,lstart="], {
      timeoutMs: this.config.supervisor.probeCommandTimeoutMs,
    });
    return result.code === 0 ? parsePsLine(result.stdout, pid) : null;
  }

  attach(): Promise<number> {
    const [command, args] = this.asServiceUser("screen", ["-r", this.config.sessionName]);
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "inherit" });
      child.on("error", (error) => {
        reject(new AppError("supervision", `Cannot attach to ${this.describe()}: ${error.message}`));
      });
      child.on("close", (code) => resolve(code ?? 0));
    });
  }

  private async findPid(): Promise<number | null> {
    const result = await this.run("pgrep", ["-u", this.config.serverUser, "-f", this.config.executable], {
      timeoutMs: this.config.supervisor.probeCommandTimeoutMs,
    });
    if (result.code !== 0) {
      return null;
    }

    const pid = Number(result.stdout.trim().split(/\s+/)[0]);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }

  private screen(args: string[], cwd?: string): Promise<CommandResult> {
    const [command, fullArgs] = this.asServiceUser("screen", args);
    return this.run(command, fullArgs, { timeoutMs: this.config.supervisor.probeCommandTimeoutMs, cwd });
  }

  // Sessions belong to the service account; root has to look and act through it.
  private asServiceUser(command: string, args: string[]): [string, string[]] {
    if (this.elevated && this.config.serverUser !== "root") {
      return ["sudo", ["-u", this.config.serverUser, command, ...args]];
    }
    return [command, args];
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
