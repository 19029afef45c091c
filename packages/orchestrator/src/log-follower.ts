import { appendFile, open, stat } from 'node:fs/promises';

import { toError } from '@idslab/core';
import type { Logger } from 'pino';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Copies bytes appended to `source` into `destination` on a fixed interval.
 * A source that shrinks is treated as truncated and re-read from the start.
 */
export class LogFollower {
  private offset = 0;
  private timer: NodeJS.Timeout | undefined;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly source: string,
    private readonly destination: string,
    private readonly intervalMs: number,
    private readonly log: Logger,
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.pending = this.pending
        .then(() => this.flush())
        .catch((err: unknown) => {
          this.log.warn({ source: this.source, err: toError(err).message }, 'Log follower failed to copy output');
        });
    }, this.intervalMs);
    this.timer.unref();
  }

  /** Copy whatever has been appended since the last flush. */
  async flush(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.source)).size;
    } catch (err) {
      if (isMissing(err)) return;
      throw err;
    }
    if (size < this.offset) this.offset = 0;
    if (size === this.offset) return;

    const handle = await open(this.source, 'r');
    try {
      const buffer = Buffer.alloc(size - this.offset);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.offset);
      if (bytesRead > 0) {
        await appendFile(this.destination, buffer.subarray(0, bytesRead));
        this.offset += bytesRead;
      }
    } finally {
      await handle.close();
    }
  }

  /** Clear the timer and perform a final flush. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.pending;
    await this.flush();
  }
}
