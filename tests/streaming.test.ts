/**
 * Streaming decoder tests
 */

import { describe, it, expect } from 'vitest';
import { chunkText, loadFixture } from '../src/__fixtures__/index.js';
import { responseText } from '../src/controller/index.js';
import { SerializationError } from '../src/error/index.js';
import { decodeGenerateContentResponse, parseJson } from '../src/serialization/index.js';
import { ChunkedJsonParser, decodeJsonArrayStream } from '../src/streaming/index.js';

const encoder = new TextEncoder();

/** A body that hands out `bytes` in reads of at most `size` bytes */
function byteStream(bytes: Uint8Array, size: number): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.slice(offset, offset + size));
      offset += size;
    },
  });
}

describe('ChunkedJsonParser', () => {
  const fixture = loadFixture('streaming/three-elements.json');

  it.each([1, 2, 3, 7, 64, fixture.length])('yields three elements for chunks of %i characters', (size) => {
    const parser = new ChunkedJsonParser();
    const elements = chunkText(fixture, size).flatMap((chunk) => parser.feed(chunk));
    parser.finish();

    expect(parser.isComplete).toBe(true);
    expect(elements.map((element) => responseText(decodeGenerateContentResponse(element)))).toEqual([
      'Wave "one" {',
      '\\ two ]',
      'threeé',
    ]);
  });

  it('accepts an empty array', () => {
    const parser = new ChunkedJsonParser();
    expect(parser.feed(' [ ] ')).toEqual([]);
    expect(() => parser.finish()).not.toThrow();
  });

  it('returns elements as soon as they close', () => {
    const parser = new ChunkedJsonParser();
    expect(parser.feed('[{"a":"}')).toEqual([]);
    expect(parser.feed('"}\n,{"b"')).toEqual(['{"a":"}"}']);
    expect(parser.feed(':[1,{}]}')).toEqual(['{"b":[1,{}]}']);
    expect(parser.isComplete).toBe(false);
  });

  it('fails when the stream ends before the closing bracket', () => {
    const parser = new ChunkedJsonParser();
    expect(parser.feed('[{"a":1},{"b":2}')).toEqual(['{"a":1}', '{"b":2}']);
    expect(() => parser.finish()).toThrow(new SerializationError('Stream ended before the closing "]"'));
  });

  it('fails when the stream ends inside an element', () => {
    const parser = new ChunkedJsonParser();
    parser.feed('[{"a":"x');
    expect(() => parser.finish()).toThrow('Stream ended inside an element');
  });

  it('fails on an empty stream', () => {
    expect(() => new ChunkedJsonParser().finish()).toThrow('Stream ended before the array started');
  });

  it('rejects input that is not an array of objects', () => {
    expect(() => new ChunkedJsonParser().feed('{"a":1}')).toThrow(
      'Unexpected "{" at offset 0 of stream: expected "["'
    );
    expect(() => new ChunkedJsonParser().feed('[1]')).toThrow('Unexpected "1" at offset 1 of stream: expected an object');
    expect(() => new ChunkedJsonParser().feed('[{"a":1},]')).toThrow(
      'Unexpected "]" at offset 9 of stream: expected an object'
    );
    expect(() => new ChunkedJsonParser().feed('[] x')).toThrow(
      'Unexpected "x" at offset 3 of stream: data after the end of the array'
    );
  });

  it('reports offsets across chunks', () => {
    const parser = new ChunkedJsonParser();
    parser.feed('[{"a":1}');
    expect(() => parser.feed(' ;')).toThrow('Unexpected ";" at offset 9 of stream: expected "," or "]"');
  });

  it('can be reset', () => {
    const parser = new ChunkedJsonParser();
    parser.feed('[{"a":');
    parser.reset();
    expect(parser.feed('[{"b":1}]')).toEqual(['{"b":1}']);
  });
});

describe('decodeJsonArrayStream', () => {
  it('decodes multi-byte characters split across reads', async () => {
    const bytes = encoder.encode(loadFixture('streaming/three-elements.json'));
    const texts: string[] = [];

    for await (const response of decodeJsonArrayStream(byteStream(bytes, 5), decodeGenerateContentResponse)) {
      texts.push(responseText(response));
    }

    expect(texts).toEqual(['Wave "one" {', '\\ two ]', 'threeé']);
  });

  it('yields the elements before failing on a truncated body', async () => {
    const received: unknown[] = [];
    const consume = async () => {
      for await (const element of decodeJsonArrayStream(byteStream(encoder.encode('[{"n":1},'), 4), parseJson)) {
        received.push(element);
      }
    };

    await expect(consume()).rejects.toThrow(new SerializationError('Stream ended before the closing "]"'));
    expect(received).toEqual([{ n: 1 }]);
  });

  it('cancels the body when the consumer stops early', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('[{"n":1},{"n":2}'));
      },
      cancel() {
        cancelled = true;
      },
    });

    const received: unknown[] = [];
    for await (const element of decodeJsonArrayStream(body, parseJson)) {
      received.push(element);
      break;
    }

    expect(received).toEqual([{ n: 1 }]);
    expect(cancelled).toBe(true);
  });

  it('stops a pending read when the signal aborts', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('[{"n":1}'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const abort = new AbortController();
    const elements = decodeJsonArrayStream(body, parseJson, { signal: abort.signal });

    expect(await elements.next()).toEqual({ done: false, value: { n: 1 } });

    const pending = elements.next();
    abort.abort(new Error('stopped by test'));

    await expect(pending).rejects.toThrow('stopped by test');
    expect(cancelled).toBe(true);
  });
});
