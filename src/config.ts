import path from "node:path";
import { mkdir } from "node:fs/promises";
import { AppError } from "./utils";

type Env = Record<string, string | undefined>;

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
  to: string[];
};

export type NotificationConfig = {
  enabled: boolean;
  events: {
    updateStart: boolean;
    updateSuccess: boolean;
    updateFailure: boolean;
    noUpdate: boolean;
  };
  telegram: {
    botToken: string;
    chatIds: string[];
    apiBaseUrl: string;
    retries: number;
  } | null;
  smtp: SmtpConfig | null;
};

export type ManagerConfig = {
  serverDir: string;
  backupDir: string;
  tempDir: string;
  logDir: string;
  logFile: string;
  logLevel: "debug" | "info";
  serverUser: string;
  sessionName: string;
  executable: string;
  requireRoot: boolean;
  download: {
    fallbackUrl: string;
    linksApiUrl: string;
    pageUrl: string;
    cdnUrlTemplate: string;
    linuxDownloadType: string;
    userAgent: string;
    requestTimeoutMs: number;
    requestRetries: number;
    probeTimeoutMs: number;
    downloadTimeoutMs: number;
    progressIntervalMs: number;
  };
  backup: {
    prefix: string;
    retentionDays: number;
  };
  preserve: {
    files: string[];
    directories: string[];
  };
  supervisor: {
    startSettleMs: number;
    shutdownTimeoutMs: number;
    pollIntervalMs: number;
    warningSeconds: number[];
    saveHoldDelayMs: number;
    saveQueryDelayMs: number;
    saveResumeDelayMs: number;
    killSettleMs: number;
    restartDelayMs: number;
    probeCommandTimeoutMs: number;
  };
  notifications: NotificationConfig;
};

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new AppError("invalid-input", `${key} must be a non-negative integer (got "${raw}").`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === "true" || raw === "1" || raw === "yes";
}

/** Per-event switch; the `TELEGRAM_`-prefixed spelling is accepted when the short one is unset. */
function readEventToggle(env: Env, key: string, fallback: boolean): boolean {
  return readBool(env, key, readBool(env, `TELEGRAM_${key}`, fallback));
}

export function parseList(raw: string | undefined, fallback: string[] = []): string[] {
  if (raw === undefined) {
    return fallback;
  }
  return raw
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readSmtp(env: Env): SmtpConfig | null {
  if (!env.SMTP_HOST || !env.SMTP_FROM || !env.SMTP_TO) {
    return null;
  }

  return {
    host: env.SMTP_HOST,
    port: readInt(env, "SMTP_PORT", 587),
    secure: readBool(env, "SMTP_SECURE", false),
    user: env.SMTP_USER ?? "",
    pass: env.SMTP_PASS ?? "",
    from: env.SMTP_FROM,
    to: parseList(env.SMTP_TO),
  };
}

export function loadConfig(env: Env = process.env): ManagerConfig {
  const cwd = path.resolve(env.BEDROCK_MANAGER_CWD ?? process.cwd());
  const resolveFromCwd = (pathname: string): string => {
    return path.isAbsolute(pathname) ? pathname : path.resolve(cwd, pathname);
  };

  const serverUser = env.BEDROCK_SERVER_USER ?? "mcserver";
  const logDir = resolveFromCwd(env.LOG_DIR ?? "/var/log/minecraft");
  const telegramToken = env.TELEGRAM_BOT_TOKEN?.trim() ?? "";
  const telegramChats = parseList(env.TELEGRAM_CHAT_IDS);

  const config: ManagerConfig = {
    serverDir: resolveFromCwd(env.BEDROCK_SERVER_DIR ?? `/home/${serverUser}/minecraft-server`),
    backupDir: resolveFromCwd(env.BEDROCK_BACKUP_DIR ?? `/home/${serverUser}/backups`),
    tempDir: resolveFromCwd(env.BEDROCK_TEMP_DIR ?? "/tmp/minecraft-update"),
    logDir,
    logFile: resolveFromCwd(env.LOG_FILE ?? path.join(logDir, "minecraft-server.log")),
    logLevel: env.LOG_LEVEL?.toLowerCase() === "debug" ? "debug" : "info",
    serverUser,
    sessionName: env.BEDROCK_SESSION_NAME ?? "minecraft-server",
    executable: env.BEDROCK_EXECUTABLE ?? "bedrock_server",
    requireRoot: readBool(env, "BEDROCK_REQUIRE_ROOT", true),
    download: {
      fallbackUrl:
        env.BEDROCK_DOWNLOAD_URL ?? "https://minecraft.azureedge.net/bin-linux/bedrock-server-1.21.44.01.zip",
      linksApiUrl:
        env.BEDROCK_LINKS_API_URL ?? "https://net-secondary.web.minecraft-services.net/api/v1.0/download/links",
      pageUrl: env.BEDROCK_DOWNLOAD_PAGE_URL ?? "https://www.minecraft.net/en-us/download/server/bedrock",
      cdnUrlTemplate:
        env.BEDROCK_CDN_URL_TEMPLATE ?? "https://minecraft.azureedge.net/bin-linux/bedrock-server-{version}.zip",
      linuxDownloadType: env.BEDROCK_DOWNLOAD_TYPE ?? "serverBedrockLinux",
      userAgent: env.BEDROCK_USER_AGENT ?? DEFAULT_USER_AGENT,
      requestTimeoutMs: Math.min(readInt(env, "BEDROCK_REQUEST_TIMEOUT_MS", 30_000), 30_000),
      requestRetries: Math.min(readInt(env, "BEDROCK_REQUEST_RETRIES", 2), 2),
      probeTimeoutMs: readInt(env, "BEDROCK_PROBE_TIMEOUT_MS", 15_000),
      downloadTimeoutMs: readInt(env, "BEDROCK_DOWNLOAD_TIMEOUT_MS", 1_800_000),
      progressIntervalMs: readInt(env, "BEDROCK_DOWNLOAD_PROGRESS_INTERVAL_MS", 2_000),
    },
    backup: {
      prefix: env.BEDROCK_BACKUP_PREFIX ?? "minecraft-backup",
      retentionDays: readInt(env, "BEDROCK_BACKUP_RETENTION_DAYS", 30),
    },
    preserve: {
      files: parseList(env.BEDROCK_PRESERVE_FILES, [
        "server.properties",
        "allowlist.json",
        "permissions.json",
        ".installed_version",
      ]),
      directories: parseList(env.BEDROCK_PRESERVE_DIRS, ["worlds", "behavior_packs", "resource_packs"]),
    },
    supervisor: {
      startSettleMs: readInt(env, "BEDROCK_START_SETTLE_MS", 3_000),
      shutdownTimeoutMs: readInt(env, "BEDROCK_SHUTDOWN_TIMEOUT_MS", 60_000),
      pollIntervalMs: 1_000,
      warningSeconds: parseList(env.BEDROCK_SHUTDOWN_WARNINGS, ["60", "15", "5"]).map((item) => {
        const value = Number(item);
        if (!Number.isInteger(value) || value <= 0) {
          throw new AppError("invalid-input", `BEDROCK_SHUTDOWN_WARNINGS contains an invalid value: ${item}`);
        }
        return value;
      }),
      saveHoldDelayMs: 2_000,
      saveQueryDelayMs: 3_000,
      saveResumeDelayMs: 2_000,
      killSettleMs: 2_000,
      restartDelayMs: readInt(env, "BEDROCK_RESTART_DELAY_MS", 5_000),
      probeCommandTimeoutMs: readInt(env, "BEDROCK_PROBE_COMMAND_TIMEOUT_MS", 5_000),
    },
    notifications: {
      enabled: readBool(env, "TELEGRAM_ENABLED", false) || readBool(env, "NOTIFICATIONS_ENABLED", false),
      events: {
        updateStart: readEventToggle(env, "NOTIFY_UPDATE_START", true),
        updateSuccess: readEventToggle(env, "NOTIFY_UPDATE_SUCCESS", true),
        updateFailure: readEventToggle(env, "NOTIFY_UPDATE_FAILURE", true),
        noUpdate: readEventToggle(env, "NOTIFY_NO_UPDATE", false),
      },
      telegram:
        telegramToken && telegramChats.length > 0
          ? {
              botToken: telegramToken,
              chatIds: telegramChats,
              apiBaseUrl: env.TELEGRAM_API_BASE_URL ?? "https://api.telegram.org",
              retries: readInt(env, "TELEGRAM_RETRIES", 2),
            }
          : null,
      smtp: readSmtp(env),
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export async function ensureDirectories(config: ManagerConfig): Promise<void> {
  await mkdir(config.backupDir, { recursive: true });
  await mkdir(config.tempDir, { recursive: true });
  await mkdir(config.logDir, { recursive: true });
}
