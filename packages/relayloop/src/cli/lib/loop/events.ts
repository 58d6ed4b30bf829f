/**
 * JSONL event log writer for relay sessions.
 *
 * Append-only, serialized write queue so records never interleave.
 */

import { open, type FileHandle } from 'node:fs/promises';

import type { LoopEventInput } from '../../../lib/types.js';

export class EventLogger {
  private fd: FileHandle | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(private readonly filePath: string) {}

  /** Open the event log file for appending. */
  async open(): Promise<void> {
    this.fd = await open(this.filePath, 'a');
  }

  /** Emit a single event. Serialized through a write queue. */
  emit(event: LoopEventInput): void {
    const record = {
      v: 1 as const,
      ts: new Date().toISOString(),
      ...event,
    };
    const line = JSON.stringify(record) + '\n';

    // Chain onto the write queue so only one write is in-flight at a time
    this.writeQueue = this.writeQueue.then(async () => {
      if (!this.fd || this.writeError) return;
      try {
        await this.fd.write(line);
      } catch (error) {
        this.writeError = error;
      }
    });
  }

  /**
   * Flush all pending writes and close the file handle.
   * Rejects with the first write error, if any.
   */
  async close(): Promise<void> {
    await this.writeQueue;
    if (this.fd) {
      await this.fd.close();
      this.fd = null;
    }
    if (this.writeError) {
      throw this.writeError;
    }
  }
}
