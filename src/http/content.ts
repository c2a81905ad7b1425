/**
 * Response materializer shared by every download/raw operation.
 *
 * Precedence: iterator, then streamed, then buffered. Both chunked modes sit
 * on ResponseHandle.chunks(); the callback mode simply drives the iterator.
 */

import { DEFAULT_CHUNK_SIZE, ResponseHandle, assertChunkSize } from './response';

/** Receives each chunk in streamed mode. Awaited before the next chunk is read. */
export type ChunkHandler = (chunk: Buffer) => void | Promise<void>;

export interface ResponseContentOptions {
  /** Push chunks to `action` and resolve undefined. */
  streamed?: boolean;
  /** Return the lazy chunk iterator. Wins over `streamed`. */
  iterator?: boolean;
  action?: ChunkHandler;
  /** Bytes per chunk in streamed and iterator mode (default 1024). */
  chunkSize?: number;
}

/** What a download resolves to, depending on the mode. */
export type ResponseContent = Buffer | AsyncGenerator<Buffer, void, undefined> | undefined;

export async function responseContent(
  response: ResponseHandle,
  options: ResponseContentOptions = {},
): Promise<ResponseContent> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

  if (options.iterator || options.streamed) {
    try {
      assertChunkSize(chunkSize);
    } catch (err) {
      await response.close();
      throw err;
    }
  }

  if (options.iterator) {
    return response.chunks(chunkSize);
  }

  if (options.streamed) {
    for await (const chunk of response.chunks(chunkSize)) {
      if (options.action) {
        await options.action(chunk);
      }
    }
    return undefined;
  }

  return response.buffer();
}
