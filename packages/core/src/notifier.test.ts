import { describe, it, expect, vi } from 'vitest';
import { deliver } from './notifier.js';
import type { Notifier, Notification } from './notifier.js';

function makeNotification(recipients: string[]): Notification {
  return { recipients, subject: 'Subject', body: 'Body', priority: 'HIGH' };
}

describe('deliver', () => {
  it('reports delivery with de-duplicated recipients', async () => {
    const notifier: Notifier = { send: vi.fn().mockResolvedValue(undefined) };

    const outcome = await deliver(notifier, makeNotification(['a@example.org', 'a@example.org', 'b@example.org']));

    expect(outcome).toEqual({ delivered: true, recipientCount: 2 });
    expect(vi.mocked(notifier.send).mock.calls[0]![0].recipients).toEqual(['a@example.org', 'b@example.org']);
  });

  it('does not call the notifier without recipients', async () => {
    const notifier: Notifier = { send: vi.fn() };

    const outcome = await deliver(notifier, makeNotification(['', '  ']));

    expect(outcome).toEqual({ delivered: false, recipientCount: 0, error: 'no recipients' });
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('absorbs delivery failures', async () => {
    const notifier: Notifier = { send: vi.fn().mockRejectedValue(new Error('SMTP down')) };

    const outcome = await deliver(notifier, makeNotification(['a@example.org']));

    expect(outcome).toEqual({ delivered: false, recipientCount: 0, error: 'SMTP down' });
  });

  it('gives up on a notifier that does not answer in time', async () => {
    vi.useFakeTimers();
    try {
      const notifier: Notifier = { send: vi.fn(() => new Promise<void>(() => undefined)) };

      const pending = deliver(notifier, makeNotification(['a@example.org']), { timeoutMs: 1000 });
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toEqual({
        delivered: false,
        recipientCount: 0,
        error: 'delivery timed out after 1000ms',
      });
    } finally {
      vi.useRealTimers();
    }
  });

  it('delivers normally when the notifier answers within the timeout', async () => {
    const notifier: Notifier = { send: vi.fn().mockResolvedValue(undefined) };

    const outcome = await deliver(notifier, makeNotification(['a@example.org']), { timeoutMs: 1000 });

    expect(outcome).toEqual({ delivered: true, recipientCount: 1 });
  });
});
