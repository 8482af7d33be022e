import nodemailer from "nodemailer";
import os from "node:os";
import type { NotificationConfig, SmtpConfig } from "./config";
import type { FetchFn } from "./fetcher";
import type { Logger } from "./logger";
import { errorMessage, sleep } from "./utils";

export type NotificationEvent = "update-start" | "update-success" | "update-failure" | "no-update";

export type MailMessage = { from: string; to: string; subject: string; text: string };

export type MailTransport = { sendMail(message: MailMessage): Promise<unknown> };

export type NotifierOptions = {
  fetchFn?: FetchFn;
  createTransport?: (smtp: SmtpConfig) => MailTransport;
  hostname?: string;
  retryDelayMs?: number;
};

const EVENT_TITLES: Record<NotificationEvent, string> = {
  "update-start": "Update started",
  "update-success": "Update completed",
  "update-failure": "Update failed",
  "no-update": "No update needed",
};

function smtpTransport(smtp: SmtpConfig): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
  });
}

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export class Notifier {
  private readonly config: NotificationConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly createTransport: (smtp: SmtpConfig) => MailTransport;
  private readonly hostname: string;
  private readonly retryDelayMs: number;

  constructor(config: NotificationConfig, logger: Logger, options: NotifierOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.createTransport = options.createTransport ?? smtpTransport;
    this.hostname = options.hostname ?? os.hostname();
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
  }

  isEnabled(event: NotificationEvent): boolean {
    if (!this.config.enabled) {
      return false;
    }

    switch (event) {
      case "update-start":
        return this.config.events.updateStart;
      case "update-success":
        return this.config.events.updateSuccess;
      case "update-failure":
        return this.config.events.updateFailure;
      case "no-update":
        return this.config.events.noUpdate;
    }
  }

  /** Best-effort delivery to every configured transport. Never throws. */
  async notify(event: NotificationEvent, message: string): Promise<void> {
    if (!this.isEnabled(event)) {
      return;
    }

    if (!this.config.telegram && !this.config.smtp) {
      this.logger.debug("Notifications enabled but no transport is configured");
      return;
    }

    await Promise.all([this.sendTelegram(event, message), this.sendMail(event, message)]);
  }

  private async sendTelegram(event: NotificationEvent, message: string): Promise<void> {
    const telegram = this.config.telegram;
    if (!telegram) {
      return;
    }

    const url = `${telegram.apiBaseUrl.replace(/\/+$/, "")}/bot${telegram.botToken}/sendMessage`;
    const text = `<b>[${escapeHtml(this.hostname)}] Minecraft Bedrock: ${EVENT_TITLES[event]}</b>\n${escapeHtml(message)}`;

    for (const chatId of telegram.chatIds) {
      let delivered = false;
      let lastError = "";

      for (let attempt = 0; attempt <= telegram.retries && !delivered; attempt += 1) {
        if (attempt > 0) {
          await sleep(this.retryDelayMs);
        }

        try {
          const response = await this.fetchFn(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ chat_id: chatId, text, parse_mode: "HTML", disable_web_page_preview: true }),
          });

          if (response.ok) {
            delivered = true;
          } else {
            lastError = `${response.status} ${response.statusText}`;
          }
        } catch (error) {
          lastError = errorMessage(error);
        }
      }

      if (delivered) {
        this.logger.debug(`Telegram notification sent to chat ${chatId}`);
      } else {
        this.logger.warn(`Failed to send Telegram notification to chat ${chatId}: ${lastError}`);
      }
    }
  }

  private async sendMail(event: NotificationEvent, message: string): Promise<void> {
    const smtp = this.config.smtp;
    if (!smtp || smtp.to.length === 0) {
      return;
    }

    try {
      const transport = this.createTransport(smtp);
      await transport.sendMail({
        from: smtp.from,
        to: smtp.to.join(", "),
        subject: `[${this.hostname}] Minecraft Bedrock: ${EVENT_TITLES[event]}`,
        text: message,
      });
      this.logger.debug(`E-mail notification sent to ${smtp.to.join(", ")}`);
    } catch (error) {
      this.logger.warn(`Failed to send e-mail notification: ${errorMessage(error)}`);
    }
  }
}
