import { spawn } from "node:child_process";
import { chown, lstat, readdir } from "node:fs/promises";
import path from "node:path";

export type CommandResult = { code: number; stdout: string; stderr: string; timedOut: boolean };

export type CommandOptions = {
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type Account = { uid: number; gid: number };

/**
 * Runs a command to completion and captures its output. Spawn failures (missing binary)
 * resolve with code 127 rather than rejecting, so probes can treat them as a plain "no".
 */
export function runCommandCapture(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | null = null;

    const finish = (result: CommandResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      resolve(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    if (options.timeoutMs) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);
    }

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });

    child.on("error", (error) => {
      finish({ code: 127, stdout, stderr: stderr || error.message, timedOut });
    });

    child.on("close", (code) => {
      finish({ code: timedOut ? 124 : (code ?? 1), stdout, stderr, timedOut });
    });
  });
}

export async function commandExists(name: string): Promise<boolean> {
  const result = await runCommandCapture("sh", ["-c", `command -v "${name.replace(/"/g, "")}"`], { timeoutMs: 5_000 });
  return result.code === 0 && result.stdout.trim().length > 0;
}

export function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

export async function resolveAccount(user: string): Promise<Account | null> {
  const [uid, gid] = await Promise.all([
    runCommandCapture("id", ["-u", user], { timeoutMs: 5_000 }),
    runCommandCapture("id", ["-g", user], { timeoutMs: 5_000 }),
  ]);

  if (uid.code !== 0 || gid.code !== 0) {
    return null;
  }

  const account = { uid: Number(uid.stdout.trim()), gid: Number(gid.stdout.trim()) };
  return Number.isInteger(account.uid) && Number.isInteger(account.gid) ? account : null;
}

export async function chownRecursive(target: string, account: Account): Promise<void> {
  await chown(target, account.uid, account.gid);

  const targetStats = await lstat(target);
  if (!targetStats.isDirectory()) {
    return;
  }

  const entries = await readdir(target, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(target, entry.name);
    if (entry.isSymbolicLink()) {
      continue;
    }
    await chownRecursive(entryPath, account);
  }
}
