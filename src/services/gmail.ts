/**
 * Gmail SMTP Client using App Passwords
 * Simple wrapper for sending HTML emails via Gmail
 */

import nodemailer, { type Transporter } from "nodemailer";
import type { EmailResult } from "@/core/types";
import { errorMessage } from "@/core/errors";
import { createLogger } from "@/utils/logger";

const log = createLogger("gmail");

// ============================================================================
// Types
// ============================================================================

export interface EmailMessage {
  to: string;
  toName?: string;
  subject: string;
  htmlBody: string;
}

export interface GmailCredentials {
  user?: string;
  appPassword?: string;
}

// ============================================================================
// Configuration
// ============================================================================

export function getGmailConfig(credentials: GmailCredentials) {
  const { user, appPassword: pass } = credentials;

  if (!user || !pass) {
    throw new Error(
      "Missing Gmail credentials: GMAIL_USER and GMAIL_APP_PASSWORD required"
    );
  }

  return { user, pass };
}

// ============================================================================
// Send
// ============================================================================

export class GmailSender {
  private transporter: Transporter | null = null;

  constructor(private readonly credentials: GmailCredentials) {}

  private getTransporter() {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        service: "gmail",
        auth: getGmailConfig(this.credentials),
      });
    }
    return this.transporter;
  }

  /**
   * Send one email. Failures are reported in the result, not thrown.
   */
  async send(msg: EmailMessage): Promise<EmailResult> {
    const start = performance.now();

    try {
      const transporter = this.getTransporter();
      log.debug("Sending email", { to: msg.to, subject: msg.subject });

      const info = await transporter.sendMail({
        from: this.credentials.user,
        to: msg.toName ? `"${msg.toName}" <${msg.to}>` : msg.to,
        subject: msg.subject,
        html: msg.htmlBody,
      });

      log.info("Email sent successfully", {
        to: msg.to,
        messageId: info.messageId,
        durationMs: Math.round(performance.now() - start),
      });

      return { success: true, messageId: info.messageId, email: msg.to };
    } catch (error) {
      const msgText = errorMessage(error);
      log.error("Failed to send email", {
        to: msg.to,
        error: msgText,
        durationMs: Math.round(performance.now() - start),
      });
      return { success: false, email: msg.to, error: msgText };
    }
  }
}
