import path from "node:path";

import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";

import type { NotifierConfig } from "./config";

export type MailTransport = {
  sendMail(message: SendMailOptions): Promise<unknown>;
};

export type SmtpSettings = {
  host: string;
  port: number;
  user: string;
  pass: string;
};

export type EmailMessage = {
  subject: string;
  html: string;
  /** Absolute paths of files to attach. */
  attachments?: readonly string[];
};

export type NotificationResult =
  | { status: "sent"; recipients: string[]; attachments: number }
  | { status: "skipped"; reason: string };

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  // 465 is implicit TLS; anything else (587 by default) must upgrade with STARTTLS.
  const secure = settings.port === 465;
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure,
    requireTLS: !secure,
    auth: { user: settings.user, pass: settings.pass }
  });
}

export type EmailNotifierOptions = {
  createTransport?: (settings: SmtpSettings) => MailTransport;
};

export class EmailNotifier {
  readonly #config: NotifierConfig;
  readonly #createTransport: (settings: SmtpSettings) => MailTransport;

  constructor(config: NotifierConfig, opts: EmailNotifierOptions = {}) {
    this.#config = config;
    this.#createTransport = opts.createTransport ?? createSmtpTransport;
  }

  /**
  * Names of the environment settings that must be set before mail can go out.
  */
  missingSettings(): string[] {
    const missing: string[] = [];
    if (!this.#config.user) {
      missing.push("SMTP_USER");
    }
    if (!this.#config.pass) {
      missing.push("SMTP_PASS");
    }
    if (this.#config.recipients.length === 0) {
      missing.push("SMTP_TO");
    }
    return missing;
  }

  async send(message: EmailMessage): Promise<NotificationResult> {
    const { user, pass, recipients, host, port } = this.#config;
    if (!user || !pass || recipients.length === 0) {
      const reason = `SMTP settings missing: ${this.missingSettings().join(", ")}`;
      console.warn(`[scan:notify] ${reason}; skipping email`);
      return { status: "skipped", reason };
    }

    const attachments = (message.attachments ?? []).map((filePath) => ({
      filename: path.basename(filePath),
      path: filePath
    }));

    const transport = this.#createTransport({ host, port, user, pass });
    await transport.sendMail({
      from: user,
      to: recipients.join(", "),
      subject: message.subject,
      html: message.html,
      attachments
    });

    console.log(`[scan:notify] email sent to ${recipients.join(", ")}`);
    return { status: "sent", recipients: [...recipients], attachments: attachments.length };
  }
}
