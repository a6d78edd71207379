import { describe, it, expect, vi } from 'vitest';
import { NotificationQueue } from '../../../src/shared/services/email/queue.js';
import { NotificationSender } from '../../../src/shared/services/email/sender.js';
import { buildPasswordResetEmail, resetLink } from '../../../src/shared/services/email/password.js';
import type { MailTransport, MailMessage } from '../../../src/shared/services/email/transports.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function recordingTransport(): MailTransport & { sent: MailMessage[] } {
  const sent: MailMessage[] = [];
  return {
    name: 'smtp',
    sent,
    deliver: vi.fn(async (message: MailMessage) => {
      sent.push(message);
      return { success: true, messageId: `id-${sent.length}` };
    }),
  };
}

describe('NotificationQueue', () => {
  it('runs at most `concurrency` jobs at once', async () => {
    const queue = new NotificationQueue(2);
    const gates = [deferred(), deferred(), deferred()];
    let running = 0;
    let peak = 0;

    gates.forEach((gate, index) => {
      queue.enqueue(`job-${index}`, async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
      });
    });

    expect(queue.size).toBe(3);
    expect(running).toBe(2);

    gates.forEach((gate) => gate.resolve());
    await queue.idle();

    expect(peak).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a failing job', async () => {
    const queue = new NotificationQueue(1);
    const completed: string[] = [];

    queue.enqueue('broken', async () => {
      throw new Error('smtp down');
    });
    queue.enqueue('healthy', async () => {
      completed.push('healthy');
    });
    await queue.idle();

    expect(completed).toEqual(['healthy']);
  });

  it('is idle immediately when empty', async () => {
    await expect(new NotificationQueue(1).idle()).resolves.toBeUndefined();
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new NotificationQueue(0)).toThrow(RangeError);
  });
});

describe('NotificationSender', () => {
  it('delivers through the transport without blocking the caller', async () => {
    const transport = recordingTransport();
    const queue = new NotificationQueue(1);
    const sender = new NotificationSender({ transport, queue, from: 'admin@example.com' });

    sender.send({ subject: 'Hi', recipients: ['john@example.com'], textBody: 'text', htmlBody: '<p>html</p>' });
    expect(queue.size).toBe(1);
    await queue.idle();

    expect(transport.sent).toEqual([
      { from: 'admin@example.com', to: ['john@example.com'], subject: 'Hi', text: 'text', html: '<p>html</p>' },
    ]);
  });

  it('drops messages when no transport is configured', () => {
    const queue = new NotificationQueue(1);
    const sender = new NotificationSender({ transport: null, queue, from: 'admin@example.com' });

    sender.send({ subject: 'Hi', recipients: ['john@example.com'], textBody: 'text', htmlBody: '' });

    expect(sender.enabled).toBe(false);
    expect(queue.size).toBe(0);
  });

  it('does not surface delivery failures to the caller', async () => {
    const transport: MailTransport = {
      name: 'resend',
      deliver: vi.fn().mockResolvedValue({ success: false, error: 'rejected' }),
    };
    const queue = new NotificationQueue(1);
    const sender = new NotificationSender({ transport, queue, from: 'admin@example.com' });

    expect(() =>
      sender.send({ subject: 'Hi', recipients: ['john@example.com'], textBody: 'text', htmlBody: '' })
    ).not.toThrow();
    await queue.idle();

    expect(transport.deliver).toHaveBeenCalledTimes(1);
  });
});

describe('password reset email', () => {
  it('links to the reset page with the token', () => {
    expect(resetLink('http://localhost:5173/', 'abc.def.ghi')).toBe('http://localhost:5173/reset-password/abc.def.ghi');
  });

  it('addresses the user and escapes HTML', () => {
    const email = buildPasswordResetEmail({
      identity: { username: '<b>john</b>', email: 'john@example.com' },
      token: 'abc.def.ghi',
      frontendUrl: 'http://localhost:5173',
      expiresInSeconds: 600,
    });

    expect(email.subject).toBe('[Microblog] Reset Your Password');
    expect(email.recipients).toEqual(['john@example.com']);
    expect(email.textBody.split('\n')[0]).toBe('Dear <b>john</b>,');
    expect(email.textBody).toContain('\nhttp://localhost:5173/reset-password/abc.def.ghi\n');
    expect(email.textBody).toContain('The link expires in 10 minutes.');
    expect(email.htmlBody).toContain('<p>Dear &lt;b&gt;john&lt;/b&gt;,</p>');
    expect(email.htmlBody).toContain('<a href="http://localhost:5173/reset-password/abc.def.ghi">click here</a>');
  });
});
