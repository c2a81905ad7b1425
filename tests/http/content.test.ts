import { responseContent } from '../../src/http/content';
import { ResponseHandle } from '../../src/http/response';
import { collect, streamingResponse } from '../helpers/streams';

const TARGET_URL = 'https://gitlab.example.com/api/v4/projects/1/jobs/1/artifacts';

function handleFor(parts: string[], onCancel?: () => void): ResponseHandle {
  return new ResponseHandle(streamingResponse(parts, { onCancel }), TARGET_URL);
}

describe('responseContent in buffered mode', () => {
  test('returns the whole body by default', async () => {
    const result = await responseContent(handleFor(['abc', '123']));
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(result?.toString()).toBe('abc123');
  });

  test('returns an empty Buffer for an empty body, not undefined', async () => {
    const result = await responseContent(handleFor([]));
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(Buffer.isBuffer(result) && result.length).toBe(0);
  });

  test('ignores chunkSize', async () => {
    const result = await responseContent(handleFor(['abc']), { chunkSize: 0 });
    expect(result?.toString()).toBe('abc');
  });
});

describe('responseContent in streamed mode', () => {
  test('passes each chunk to the handler in order and resolves undefined', async () => {
    const received: string[] = [];
    const result = await responseContent(handleFor(['abc1', '23']), {
      streamed: true,
      chunkSize: 2,
      action: (chunk) => {
        received.push(chunk.toString());
      },
    });

    expect(result).toBeUndefined();
    expect(received).toEqual(['ab', 'c1', '23']);
  });

  test('never calls the handler for an empty body', async () => {
    const action = jest.fn();
    const result = await responseContent(handleFor([]), { streamed: true, action });
    expect(result).toBeUndefined();
    expect(action).not.toHaveBeenCalled();
  });

  test('drains the body when no handler is given', async () => {
    const handle = handleFor(['abcdef']);
    const result = await responseContent(handle, { streamed: true, chunkSize: 2 });
    expect(result).toBeUndefined();
    expect(handle.bodyUsed).toBe(true);
  });

  test('awaits an async handler before reading the next chunk', async () => {
    const events: string[] = [];
    await responseContent(handleFor(['aabb']), {
      streamed: true,
      chunkSize: 2,
      action: async (chunk) => {
        events.push(`start ${chunk.toString()}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`end ${chunk.toString()}`);
      },
    });
    expect(events).toEqual(['start aa', 'end aa', 'start bb', 'end bb']);
  });

  test('propagates a handler error and releases the body', async () => {
    const onCancel = jest.fn();
    const failure = new Error('disk full');
    const action = jest.fn(() => {
      throw failure;
    });

    await expect(
      responseContent(handleFor(['aa', 'bb', 'cc'], onCancel), { streamed: true, chunkSize: 2, action }),
    ).rejects.toBe(failure);
    expect(action).toHaveBeenCalledTimes(1);
    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  test('rejects an invalid chunk size and releases the body', async () => {
    const onCancel = jest.fn();
    await expect(
      responseContent(handleFor(['abc'], onCancel), { streamed: true, chunkSize: -1 }),
    ).rejects.toThrow(RangeError);
    expect(onCancel).toHaveBeenCalledTimes(1);
  });
});

describe('responseContent in iterator mode', () => {
  test('returns a lazy iterator with the same chunks as streamed mode', async () => {
    const result = await responseContent(handleFor(['abc1', '23']), { iterator: true, chunkSize: 2 });
    expect(result).toBeDefined();
    expect(Buffer.isBuffer(result)).toBe(false);
    if (result === undefined || Buffer.isBuffer(result)) return;
    expect(await collect(result)).toEqual(['ab', 'c1', '23']);
  });

  test('wins over streamed and never calls the handler', async () => {
    const action = jest.fn();
    const result = await responseContent(handleFor(['abcd']), {
      iterator: true,
      streamed: true,
      chunkSize: 2,
      action,
    });
    if (result === undefined || Buffer.isBuffer(result)) {
      throw new Error('expected an iterator');
    }
    expect(await collect(result)).toEqual(['ab', 'cd']);
    expect(action).not.toHaveBeenCalled();
  });

  test('can be pulled one chunk at a time and closed early', async () => {
    const handle = handleFor(['abcd']);
    const result = await responseContent(handle, { iterator: true, chunkSize: 2 });
    if (result === undefined || Buffer.isBuffer(result)) {
      throw new Error('expected an iterator');
    }
    const first = await result.next();
    expect(first.done).toBe(false);
    expect(String(first.value)).toBe('ab');
    await result.return();
  });

  test('releases the body when closed before the first chunk', async () => {
    const onCancel = jest.fn();
    const handle = handleFor(['abcd'], onCancel);
    const result = await responseContent(handle, { iterator: true, chunkSize: 2 });
    if (result === undefined || Buffer.isBuffer(result)) {
      throw new Error('expected an iterator');
    }

    const closed = await result.return();
    await handle.close();

    expect(closed.done).toBe(true);
    expect(onCancel).toHaveBeenCalledTimes(1);
  });
});
