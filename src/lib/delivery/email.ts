/**
 * Email delivery for digests
 * Sends the markdown digest as plain text with an HTML alternative over SMTP
 */

import nodemailer from "nodemailer";
import type { EmailSettings } from "../../config/settings";
import { logger } from "../logger";
import { markdownToHtml } from "../pipeline/report";

const SEND_TIMEOUT_MS = 30_000;

export function isEmailConfigured(settings: EmailSettings): boolean {
  return Boolean(
    settings.smtpServer && settings.sender && settings.password && settings.recipients.length > 0
  );
}

export function digestSubject(date: string): string {
  return `📚 Paper Digest - ${date}`;
}

export class EmailSender {
  constructor(private readonly settings: EmailSettings) {}

  /**
   * Send markdown content to all recipients. Returns false (after logging)
   * when configuration is incomplete or the SMTP exchange fails.
   */
  async send(subject: string, markdown: string, recipients: string[] = this.settings.recipients): Promise<boolean> {
    const { smtpServer, smtpPort, sender, password } = this.settings;

    if (!smtpServer || !sender || !password || recipients.length === 0) {
      logger.warn("Email configuration incomplete, not sending");
      return false;
    }

    // Port 465 uses implicit TLS; other ports upgrade with STARTTLS
    const secure = smtpPort === 465;
    const transporter = nodemailer.createTransport({
      host: smtpServer,
      port: smtpPort,
      secure,
      requireTLS: !secure,
      auth: { user: sender, pass: password },
      connectionTimeout: 10_000,
      greetingTimeout: 10_000,
      socketTimeout: SEND_TIMEOUT_MS,
    });

    try {
      const info = await transporter.sendMail({
        from: sender,
        to: recipients.join(", "),
        subject,
        text: markdown,
        html: markdownToHtml(markdown),
      });

      logger.info("Email sent", { messageId: info.messageId, recipients });
      return true;
    } catch (error) {
      logger.error("Failed to send email", {
        smtpServer,
        smtpPort,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    } finally {
      transporter.close();
    }
  }
}
