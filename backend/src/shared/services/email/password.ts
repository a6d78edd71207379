import escapeHtml from 'escape-html';
import type { User } from '@shared/db/entities/User.js';
import type { Notification, NotificationSender } from './sender.js';

export interface PasswordResetEmailParams {
  identity: Pick<User, 'username' | 'email'>;
  token: string;
  frontendUrl: string;
  expiresInSeconds: number;
}

function describeLifetime(seconds: number): string {
  if (seconds % 60 === 0) {
    const minutes = seconds / 60;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  return `${seconds} second${seconds === 1 ? '' : 's'}`;
}

export function resetLink(frontendUrl: string, token: string): string {
  return `${frontendUrl.replace(/\/+$/, '')}/reset-password/${encodeURIComponent(token)}`;
}

export function buildPasswordResetEmail(params: PasswordResetEmailParams): Notification {
  const { identity, token, frontendUrl, expiresInSeconds } = params;
  const link = resetLink(frontendUrl, token);
  const lifetime = describeLifetime(expiresInSeconds);

  const textBody = [
    `Dear ${identity.username},`,
    '',
    'To reset your password click on the following link:',
    '',
    link,
    '',
    `The link expires in ${lifetime}.`,
    'If you have not requested a password reset simply ignore this message.',
    '',
    'Sincerely,',
    '',
    'The Microblog Team',
  ].join('\n');

  const htmlBody = `<!DOCTYPE html>
<html>
  <head><meta charset="utf-8"></head>
  <body>
    <p>Dear ${escapeHtml(identity.username)},</p>
    <p>To reset your password <a href="${escapeHtml(link)}">click here</a>.</p>
    <p>Alternatively, you can paste the following link in your browser's address bar:</p>
    <p>${escapeHtml(link)}</p>
    <p>The link expires in ${escapeHtml(lifetime)}.</p>
    <p>If you have not requested a password reset simply ignore this message.</p>
    <p>Sincerely,</p>
    <p>The Microblog Team</p>
  </body>
</html>`;

  return {
    subject: '[Microblog] Reset Your Password',
    recipients: [identity.email],
    textBody,
    htmlBody,
  };
}

export function sendPasswordResetEmail(sender: NotificationSender, params: PasswordResetEmailParams): void {
  sender.send(buildPasswordResetEmail(params));
}
