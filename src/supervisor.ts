import { stat } from "node:fs/promises";
import path from "node:path";
import type { ManagerConfig } from "./config";
import type { Logger } from "./logger";
import type { ProcessInfo, SessionBackend } from "./session";
import { AppError, errorMessage, isDirectory, sleep } from "./utils";

export type ServerState = "running" | "stopped";

export type StartResult = { started: boolean; alreadyRunning: boolean };

export type StopResult = { wasRunning: boolean; graceful: boolean };

export type StopOptions = { force?: boolean };

type Wait = (ms: number) => Promise<void>;

const PROGRESS_LOG_INTERVAL_MS = 10_000;

/**
 * Lifecycle control for the server hosted in a session. Holds no state of its own:
 * every decision re-probes the session and the process.
 */
export class Supervisor {
  private readonly config: ManagerConfig;
  private readonly logger: Logger;
  private readonly session: SessionBackend;
  private readonly wait: Wait;

  constructor(config: ManagerConfig, logger: Logger, session: SessionBackend, wait: Wait = sleep) {
    this.config = config;
    this.logger = logger;
    this.session = session;
    this.wait = wait;
  }

  async isRunning(): Promise<boolean> {
    return (await this.session.sessionExists()) && (await this.session.processExists());
  }

  async state(): Promise<ServerState> {
    return (await this.isRunning()) ? "running" : "stopped";
  }

  async start(): Promise<StartResult> {
    if (await this.isRunning()) {
      this.logger.warn(`Server is already running in ${this.session.describe()}`);
      return { started: false, alreadyRunning: true };
    }

    await this.assertStartable();

    if (await this.session.sessionExists()) {
      this.logger.debug("Removing stale session left behind by a previous run");
      await this.session.quit();
    }

    this.logger.info("Starting Minecraft Bedrock Server...");
    await this.session.launch(this.config.serverDir, this.config.executable);
    await this.wait(this.config.supervisor.startSettleMs);

    if (!(await this.isRunning())) {
      throw new AppError("supervision", "Failed to start server. Check the server logs for details.");
    }

    this.logger.info(`Server started successfully in ${this.session.describe()}`);
    this.logger.info(`To access the console: screen -r ${this.config.sessionName}`);
    return { started: true, alreadyRunning: false };
  }

  async stop(options: StopOptions = {}): Promise<StopResult> {
    if (!(await this.isRunning())) {
      if (await this.session.sessionExists()) {
        await this.session.quit();
      }
      this.logger.info("Server is not running");
      return { wasRunning: false, graceful: true };
    }

    if (options.force) {
      this.logger.warn("Force stopping server...");
      await this.terminate();
      this.logger.info("Server force stopped");
      return { wasRunning: true, graceful: false };
    }

    this.logger.info("Stopping Minecraft Bedrock Server gracefully...");
    let delivered = true;
    try {
      if (await this.announceShutdown()) {
        await this.saveWorld();
        await this.session.stuff("stop");
      }
    } catch (error) {
      this.logger.warn(`Could not send shutdown commands: ${errorMessage(error)}`);
      delivered = false;
    }

    if (delivered && (await this.waitForExit())) {
      if (await this.session.sessionExists()) {
        await this.session.quit();
      }
      this.logger.info("Server stopped gracefully");
      return { wasRunning: true, graceful: true };
    }

    this.logger.warn("Server did not stop gracefully, forcing shutdown...");
    await this.terminate();
    this.logger.info("Server stopped");
    return { wasRunning: true, graceful: false };
  }

  async restart(): Promise<StartResult> {
    this.logger.info("Restarting Minecraft Bedrock Server...");
    await this.stop();
    await this.wait(this.config.supervisor.restartDelayMs);
    return this.start();
  }

  async sendCommand(line: string): Promise<void> {
    const trimmed = line.trim();
    if (!trimmed) {
      throw new AppError("invalid-input", "Command cannot be empty.");
    }

    if (!(await this.isRunning())) {
      throw new AppError("supervision", "Server is not running.");
    }

    await this.session.stuff(trimmed);
    this.logger.info(`Command sent: ${trimmed}`);
  }

  async attach(): Promise<number> {
    if (!(await this.isRunning())) {
      throw new AppError("supervision", "Server is not running.");
    }

    this.logger.info("Connecting to server console...");
    this.logger.info("Press Ctrl+A, then D to detach without stopping the server");
    return this.session.attach();
  }

  async processInfo(): Promise<ProcessInfo | null> {
    return (await this.isRunning()) ? this.session.processInfo() : null;
  }

  private async assertStartable(): Promise<void> {
    const serverDir = this.config.serverDir;
    if (!(await isDirectory(serverDir))) {
      throw new AppError("environment", `Server directory not found: ${serverDir}`);
    }

    const executablePath = path.join(serverDir, this.config.executable);
    let mode: number;
    try {
      const executableStats = await stat(executablePath);
      if (!executableStats.isFile()) {
        throw new AppError("environment", `Server executable is not a file: ${executablePath}`);
      }
      mode = executableStats.mode;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new AppError("environment", `Server executable not found: ${executablePath}`);
    }

    if ((mode & 0o111) === 0) {
      throw new AppError("environment", `Server executable is not executable: ${executablePath}`);
    }
  }

  /** Returns false when the server went away during the countdown. */
  private async announceShutdown(): Promise<boolean> {
    const schedule = [...this.config.supervisor.warningSeconds].sort((a, b) => b - a);

    for (let index = 0; index < schedule.length; index += 1) {
      const seconds = schedule[index];
      const next = index + 1 < schedule.length ? schedule[index + 1] : 0;

      await this.session.stuff(`say Server will shut down in ${seconds} seconds. Please save your progress!`);
      this.logger.info(`Shutdown warning sent: ${seconds} seconds`);
      await this.wait((seconds - next) * 1000);

      if (!(await this.isRunning())) {
        this.logger.info("Server exited during shutdown countdown");
        return false;
      }
    }

    return true;
  }

  private async saveWorld(): Promise<void> {
    const { saveHoldDelayMs, saveQueryDelayMs, saveResumeDelayMs } = this.config.supervisor;
    this.logger.info("Saving world data...");

    await this.session.stuff("save hold");
    await this.wait(saveHoldDelayMs);
    await this.session.stuff("save query");
    await this.wait(saveQueryDelayMs);
    await this.session.stuff("save resume");
    await this.wait(saveResumeDelayMs);
  }

  private async waitForExit(): Promise<boolean> {
    const { shutdownTimeoutMs, pollIntervalMs } = this.config.supervisor;
    const step = Math.max(pollIntervalMs, 1);
    let elapsed = 0;

    while (elapsed < shutdownTimeoutMs) {
      if (!(await this.session.processExists())) {
        return true;
      }

      await this.wait(step);
      elapsed += step;

      if (elapsed % PROGRESS_LOG_INTERVAL_MS === 0) {
        this.logger.info(`Waiting for server to stop... (${elapsed / 1000}s)`);
      }
    }

    return !(await this.session.processExists());
  }

  private async terminate(): Promise<void> {
    const { killSettleMs } = this.config.supervisor;

    await this.session.quit();
    await this.session.signalProcess("TERM");
    await this.wait(killSettleMs);

    if (await this.session.processExists()) {
      this.logger.warn("Process survived SIGTERM, sending SIGKILL");
      await this.session.signalProcess("KILL");
      await this.wait(killSettleMs);
    }

    if ((await this.session.processExists()) || (await this.session.sessionExists())) {
      throw new AppError("supervision", "Failed to stop server: process is still running.");
    }
  }
}
