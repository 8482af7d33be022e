import chalk from "chalk";
import { appendFileSync, existsSync } from "node:fs";
import path from "node:path";
import { humanTimestamp } from "./utils";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type LogSink = {
  console(line: string, level: LogLevel | "HEADER"): void;
  file(line: string): void;
};

export type LoggerOptions = {
  logFile?: string | null;
  verbose?: boolean;
  sink?: LogSink;
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  DEBUG: chalk.blue,
  INFO: chalk.green,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

function defaultSink(logFile: string | null): LogSink {
  return {
    console(line, level) {
      if (level === "ERROR") {
        console.error(line);
      } else {
        console.log(line);
      }
    },
    file(line) {
      // Only append once the log directory has been provisioned.
      if (!logFile || !existsSync(path.dirname(logFile))) {
        return;
      }
      try {
        appendFileSync(logFile, `${line}\n`, "utf8");
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`[ERROR] Cannot write log file ${logFile}: ${message}`));
      }
    },
  };
}

export class Logger {
  private readonly sink: LogSink;
  private readonly verbose: boolean;

  constructor(options: LoggerOptions = {}) {
    this.sink = options.sink ?? defaultSink(options.logFile ?? null);
    this.verbose = options.verbose ?? false;
  }

  debug(message: string): void {
    this.write("DEBUG", message);
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARN", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  header(message: string): void {
    this.sink.console(chalk.cyan(message), "HEADER");
  }

  blank(): void {
    this.sink.console("", "HEADER");
  }

  private write(level: LogLevel, message: string): void {
    if (level !== "DEBUG" || this.verbose) {
      this.sink.console(`${LEVEL_COLORS[level](`[${level}]`)} ${message}`, level);
    }
    this.sink.file(`[${humanTimestamp()}] [${level}] ${message}`);
  }
}

export type MemoryLogEntry = { level: LogLevel | "HEADER"; message: string };

// Captures log lines in memory; used by the CLI tests and by callers that want a transcript.
export class MemoryLogSink implements LogSink {
  readonly entries: MemoryLogEntry[] = [];
  readonly fileLines: string[] = [];

  console(line: string, level: LogLevel | "HEADER"): void {
    this.entries.push({ level, message: stripAnsi(line).replace(/^\[(DEBUG|INFO|WARN|ERROR)\] /, "") });
  }

  file(line: string): void {
    this.fileLines.push(line);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }
}

function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, "");
}
