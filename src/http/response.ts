/**
 * ResponseHandle: the one place bytes come off the wire.
 *
 * Wraps a fetch Response whose status has already been checked. The body can
 * be taken whole (buffer/text/json) or as fixed-size chunks, exactly once.
 * Buffered transfers arrive with their body already read into memory.
 */

import type { ReadableStreamDefaultReader } from 'stream/web';
import { GitlabConnectionError, GitlabParsingError } from '../domain/errors';
import { logger } from '../logger';

export const DEFAULT_CHUNK_SIZE = 1024;

const log = logger.child({ module: 'http.response' });

/** Throws a RangeError unless `chunkSize` is a positive integer. */
export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'unknown error';
}

/**
 * Owns the reader of a streamed body. Each read is bounded by `readTimeoutMs`
 * of silence from the server; release() cancels and unlocks exactly once.
 */
class BodyReader {
  /** Set once the chunk generator has begun reading. */
  started = false;
  private released = false;

  constructor(
    private readonly reader: ReadableStreamDefaultReader<Uint8Array>,
    private readonly url: string,
    private readonly readTimeoutMs?: number,
  ) {}

  /** Next piece of the body, or undefined at the end. */
  async read(): Promise<Uint8Array | undefined> {
    if (this.released) return undefined;
    let result: { done: boolean; value?: Uint8Array };
    try {
      result = await this.timedRead();
    } catch (err) {
      throw new GitlabConnectionError(`Response body from ${this.url} was interrupted: ${errorMessage(err)}`);
    }
    return result.done ? undefined : result.value;
  }

  /** Drop the connection unless `drained`, then unlock the body. */
  async release(drained: boolean): Promise<void> {
    if (this.released) return;
    this.released = true;
    if (!drained) {
      await this.reader.cancel().catch((err: unknown) => {
        log.debug('Cancelling response body failed', { url: this.url, error: errorMessage(err) });
      });
    }
    this.reader.releaseLock();
  }

  private async timedRead(): Promise<{ done: boolean; value?: Uint8Array }> {
    const timeoutMs = this.readTimeoutMs;
    if (timeoutMs === undefined) {
      return this.reader.read();
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`no data received for ${timeoutMs}ms`)), timeoutMs);
    });
    try {
      return await Promise.race([this.reader.read(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export class ResponseHandle {
  private consumed = false;
  private bodyReader?: BodyReader;

  constructor(
    private readonly response: Response,
    /** The URL the request was sent to, secrets masked. */
    public readonly url: string,
    private readonly bufferedBody?: Buffer,
    /** Longest wait for the next piece of a streamed body. */
    private readonly readTimeoutMs?: number,
  ) {}

  get status(): number {
    return this.response.status;
  }

  get headers(): Headers {
    return this.response.headers;
  }

  /** Parsed Content-Length, when the server sent one. */
  get contentLength(): number | undefined {
    const raw = this.response.headers.get('content-length');
    if (raw === null) return undefined;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }

  /** True once the body has been handed out or released. */
  get bodyUsed(): boolean {
    return this.consumed;
  }

  /** Read the whole body. An empty body yields an empty Buffer. */
  async buffer(): Promise<Buffer> {
    this.claim();
    if (this.bufferedBody) return this.bufferedBody;
    try {
      return Buffer.from(await this.response.arrayBuffer());
    } catch (err) {
      throw new GitlabConnectionError(`Failed to read response body from ${this.url}: ${errorMessage(err)}`, this.status);
    }
  }

  async text(): Promise<string> {
    return (await this.buffer()).toString('utf8');
  }

  /** @throws GitlabParsingError when the body is not JSON */
  async json(): Promise<unknown> {
    const text = await this.text();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new GitlabParsingError(`Failed to parse JSON from ${this.url}: ${errorMessage(err)}`, this.status, text);
    }
  }

  /**
   * Lazily yield the body in pieces of exactly `chunkSize` bytes; only the
   * final piece may be shorter. Not restartable. Ending iteration early
   * (break, return, a thrown error) cancels the underlying body, including
   * a return() before the first chunk was requested.
   */
  chunks(chunkSize: number = DEFAULT_CHUNK_SIZE): AsyncGenerator<Buffer, void, undefined> {
    assertChunkSize(chunkSize);
    this.claim();
    if (this.bufferedBody) {
      return sliceBuffer(this.bufferedBody, chunkSize);
    }
    if (!this.response.body) {
      return sliceBuffer(Buffer.alloc(0), chunkSize);
    }

    // The reader is taken here: a generator that never started runs no finally.
    const bodyReader = new BodyReader(this.response.body.getReader(), this.url, this.readTimeoutMs);
    this.bodyReader = bodyReader;

    const generator = readChunks(bodyReader, chunkSize);
    const finish = generator.return.bind(generator);
    generator.return = async (value) => {
      if (!bodyReader.started) {
        await bodyReader.release(false);
      }
      return finish(value);
    };
    return generator;
  }

  /** Release the body if nobody is reading it. */
  async close(): Promise<void> {
    if (this.consumed) {
      if (this.bodyReader && !this.bodyReader.started) {
        await this.bodyReader.release(false);
      }
      return;
    }
    this.consumed = true;
    if (this.response.body && !this.response.bodyUsed) {
      await this.response.body.cancel();
    }
  }

  private claim(): void {
    if (this.consumed) {
      throw new Error(`Response body from ${this.url} has already been consumed`);
    }
    this.consumed = true;
  }
}

async function* sliceBuffer(body: Buffer, chunkSize: number): AsyncGenerator<Buffer, void, undefined> {
  for (let offset = 0; offset < body.length; offset += chunkSize) {
    yield body.subarray(offset, offset + chunkSize);
  }
}

async function* readChunks(body: BodyReader, chunkSize: number): AsyncGenerator<Buffer, void, undefined> {
  body.started = true;
  let pending = Buffer.alloc(0);
  let drained = false;

  try {
    while (true) {
      const value = await body.read();
      if (value === undefined) {
        drained = true;
        break;
      }

      pending = pending.length === 0
        ? Buffer.from(value)
        : Buffer.concat([pending, value]);

      while (pending.length >= chunkSize) {
        yield pending.subarray(0, chunkSize);
        pending = pending.subarray(chunkSize);
      }
    }

    if (pending.length > 0) {
      yield pending;
    }
  } finally {
    // Caller stopped early, or the read failed: drop the connection instead of draining it.
    await body.release(drained);
  }
}
