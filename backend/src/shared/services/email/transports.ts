/**
 * Mail transports
 * SMTP through nodemailer, or the Resend API. Chosen from configuration.
 */

import { Resend } from 'resend';
import * as nodemailer from 'nodemailer';
import type { Config } from '@shared/config/index.js';

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface DeliveryResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface MailTransport {
  readonly name: 'smtp' | 'resend';
  deliver(message: MailMessage): Promise<DeliveryResult>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
}

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    // MAIL_USE_TLS means STARTTLS on the plain port; implicit TLS only on 465
    secure: settings.port === 465,
    requireTLS: settings.secure,
    auth: settings.username ? { user: settings.username, pass: settings.password } : undefined,
  });

  return {
    name: 'smtp',
    async deliver(message) {
      try {
        const info = await transporter.sendMail({
          from: message.from,
          to: message.to,
          subject: message.subject,
          text: message.text,
          html: message.html,
        });
        return { success: true, messageId: info.messageId };
      } catch (error) {
        return { success: false, error: error instanceof Error ? error.message : 'SMTP send failed' };
      }
    },
  };
}

export function createResendTransport(apiKey: string): MailTransport {
  const resend = new Resend(apiKey);

  return {
    name: 'resend',
    async deliver(message) {
      const result = await resend.emails.send({
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
      if (result.error) {
        return { success: false, error: result.error.message };
      }
      return { success: true, messageId: result.data?.id };
    },
  };
}

/**
 * SMTP wins when a mail server is configured. Null means sending is disabled.
 */
export function transportFromConfig(cfg: Config): MailTransport | null {
  if (cfg.mailServer) {
    return createSmtpTransport({
      host: cfg.mailServer,
      port: cfg.mailPort,
      secure: cfg.mailUseTls,
      username: cfg.mailUsername,
      password: cfg.mailPassword,
    });
  }
  if (cfg.resendApiKey) {
    return createResendTransport(cfg.resendApiKey);
  }
  return null;
}
