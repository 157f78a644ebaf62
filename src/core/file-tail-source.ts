import { promises as fsp, Stats } from 'fs';
import type { FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { LineSource } from '../common/interfaces/monitor.interfaces';
import { TailSourceError, describeError, isErrnoException } from '../common/errors';
import { TAIL_POLL_DEFAULT_MS } from '../common/time.constants';
import { logger } from '../utils/logger';

const READ_CHUNK_BYTES = 64 * 1024;

export interface FileTailOptions {
  /** Delay between polls when the file has no new data (milliseconds) */
  pollIntervalMs?: number;
  /** Emit the existing content first instead of starting at end-of-file */
  fromStart?: boolean;
}

/**
 * Mutable read position over one open generation of the file
 */
interface ReadCursor {
  handle: FileHandle;
  identity: string;
  position: number;
  pending: string;
  decoder: StringDecoder;
}

type PathState = 'same' | 'rotated' | 'missing';

/**
 * Follows a log file the way `tail -F` does and yields complete lines.
 *
 * - Lines come out in file order; a trailing partial line stays buffered
 *   until its newline arrives.
 * - Rotation (the path now points at a different file) drains the old file
 *   to its end, flushes any unterminated last line, then continues from the
 *   start of the new file.
 * - Truncation in place restarts from offset 0.
 * - A path that is briefly missing during rotation is waited for.
 *
 * Any other I/O failure ends iteration with a {@link TailSourceError}.
 */
export class FileTailSource implements LineSource {
  private readonly pollIntervalMs: number;
  private readonly fromStart: boolean;
  private closed = false;
  private wakeUp: (() => void) | null = null;

  constructor(private readonly filePath: string, options: FileTailOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? TAIL_POLL_DEFAULT_MS;
    this.fromStart = options.fromStart ?? false;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Stop following; an iteration in progress ends at its next poll
   */
  close(): void {
    this.closed = true;
    this.wakeUp?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    let cursor: ReadCursor | null = null;

    try {
      await this.ensureFileExists();
      cursor = await this.openCursor();
      if (!this.fromStart) {
        cursor.position = (await cursor.handle.stat()).size;
      }
      logger.debug(`📡 Tailing ${this.filePath} from offset ${cursor.position}`);

      while (!this.closed) {
        const readAny = yield* this.drain(cursor);
        if (this.closed) break;

        const state = await this.checkPath(cursor.identity);
        if (state === 'rotated') {
          // Catch anything appended between the last read and the rename
          yield* this.drain(cursor);
          const tail = cursor.pending + cursor.decoder.end();
          if (tail.length > 0) {
            yield stripCarriageReturn(tail);
          }

          await cursor.handle.close();
          cursor = null;
          cursor = await this.openCursor();
          logger.info(`🔄 Log rotated, following new ${this.filePath}`);
          continue;
        }

        if (!readAny || state === 'missing') {
          await this.sleep();
        }
      }
    } catch (error) {
      if (error instanceof TailSourceError) {
        throw error;
      }
      throw new TailSourceError(`Failed to tail ${this.filePath}: ${describeError(error)}`, error);
    } finally {
      if (cursor) {
        await cursor.handle.close();
      }
    }
  }

  /**
   * Read everything currently available through the cursor's handle
   *
   * @returns whether any bytes were read
   */
  private async *drain(cursor: ReadCursor): AsyncGenerator<string, boolean, undefined> {
    const { size } = await cursor.handle.stat();
    if (size < cursor.position) {
      logger.info(`✂️ ${this.filePath} was truncated, restarting from the beginning`);
      cursor.position = 0;
      cursor.pending = '';
      cursor.decoder = new StringDecoder('utf8');
    }

    const buffer = Buffer.alloc(READ_CHUNK_BYTES);
    let readAny = false;

    for (;;) {
      const { bytesRead } = await cursor.handle.read(buffer, 0, buffer.length, cursor.position);
      if (bytesRead === 0) {
        return readAny;
      }

      readAny = true;
      cursor.position += bytesRead;
      cursor.pending += cursor.decoder.write(buffer.subarray(0, bytesRead));

      const lines = cursor.pending.split('\n');
      cursor.pending = lines.pop() ?? '';
      for (const line of lines) {
        yield stripCarriageReturn(line);
      }

      if (this.closed) {
        return readAny;
      }
    }
  }

  private async openCursor(): Promise<ReadCursor> {
    const handle = await fsp.open(this.filePath, 'r');
    const stats = await handle.stat();
    return {
      handle,
      identity: fileIdentity(stats),
      position: 0,
      pending: '',
      decoder: new StringDecoder('utf8'),
    };
  }

  private async checkPath(identity: string): Promise<PathState> {
    try {
      const stats = await fsp.stat(this.filePath);
      return fileIdentity(stats) === identity ? 'same' : 'rotated';
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 'missing';
      }
      throw error;
    }
  }

  private async ensureFileExists(): Promise<void> {
    const handle = await fsp.open(this.filePath, 'a');
    await handle.close();
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, this.pollIntervalMs);

      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}

function fileIdentity(stats: Stats): string {
  return `${stats.dev}:${stats.ino}`;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
