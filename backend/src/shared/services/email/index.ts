export { NotificationQueue } from './queue.js';
export { NotificationSender, type Notification } from './sender.js';
export { transportFromConfig, createSmtpTransport, createResendTransport, type MailTransport } from './transports.js';
export { buildPasswordResetEmail, sendPasswordResetEmail, resetLink } from './password.js';
