import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { waitForBackend } from '../../src/util/waitForServices.js';
import { BackendUnavailableError } from '../../src/errors/index.js';
import { createTestBackend, type TestBackend } from '../helpers/testBackend.js';

describe('waitForBackend', () => {
  let ctx: TestBackend;

  beforeEach(async () => {
    ctx = await createTestBackend();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await ctx.cleanup();
  });

  it('should return once the backend answers', async () => {
    const ping = vi.spyOn(ctx.backend, 'ping')
      .mockRejectedValueOnce(new Error('SQLITE_BUSY'))
      .mockResolvedValueOnce(undefined);

    await waitForBackend(ctx.backend, { maxRetries: 3, retryDelayMs: 1 });

    expect(ping).toHaveBeenCalledTimes(2);
  });

  it('should give up after the last attempt', async () => {
    const ping = vi.spyOn(ctx.backend, 'ping').mockRejectedValue(new Error('unable to open database file'));

    await expect(waitForBackend(ctx.backend, { maxRetries: 2, retryDelayMs: 1 }))
      .rejects.toThrow('sqlite failed to become ready after 2 attempts: unable to open database file');
    expect(ping).toHaveBeenCalledTimes(2);
  });

  it('should attempt at least once', async () => {
    vi.spyOn(ctx.backend, 'ping').mockRejectedValue(new Error('down'));

    await expect(waitForBackend(ctx.backend, { maxRetries: 0, retryDelayMs: 1 }))
      .rejects.toBeInstanceOf(BackendUnavailableError);
  });
});
