/**
 * Lazy decoding of a streamed JSON array body.
 */

import { ChunkedJsonParser } from './chunked-json.js';

export interface StreamDecodeOptions {
  /** Aborting stops a pending read with the signal's reason */
  signal?: AbortSignal;
}

function readWithin(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  signal?: AbortSignal
): Promise<ReadableStreamReadResult<Uint8Array>> {
  if (!signal) {
    return reader.read();
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    reader.read().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Yields each element of the JSON array in `body` as soon as it is
 * complete, decoded with `decode`.
 *
 * Reading is driven by iteration: nothing is read until the first element
 * is requested. If the consumer stops early, `decode` throws or the signal
 * aborts, the body is cancelled. A body that ends before the closing `]`
 * raises SerializationError after the elements completed so far.
 */
export async function* decodeJsonArrayStream<T>(
  body: ReadableStream<Uint8Array>,
  decode: (elementText: string) => T,
  options: StreamDecodeOptions = {}
): AsyncGenerator<T, void, undefined> {
  const reader = body.getReader();
  const textDecoder = new TextDecoder('utf-8');
  const parser = new ChunkedJsonParser();
  let drained = false;
  let readFailed = false;

  try {
    while (!drained) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await readWithin(reader, options.signal);
      } catch (error) {
        readFailed = !options.signal?.aborted;
        throw error;
      }

      const text = chunk.done
        ? textDecoder.decode()
        : textDecoder.decode(chunk.value, { stream: true });
      drained = chunk.done;

      for (const element of parser.feed(text)) {
        yield decode(element);
      }
    }

    parser.finish();
  } finally {
    if (!drained && !readFailed) {
      // an aborted transport may already have errored the body
      await reader.cancel().catch((error: unknown) => {
        if (!options.signal?.aborted) {
          throw error;
        }
      });
    }
    reader.releaseLock();
  }
}
