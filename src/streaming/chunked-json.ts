/**
 * Chunked JSON parser for the streaming response format.
 *
 * `streamGenerateContent` answers with one JSON array whose elements are
 * written as they are generated:
 * [{"candidates":[...]}
 * ,{"candidates":[...]}
 * ]
 *
 * Chunk boundaries fall anywhere, including inside keys, string values and
 * escape sequences.
 */

import { SerializationError } from '../error/index.js';

type ParserState =
  | 'expectArrayStart'
  | 'expectFirstElementOrEnd'
  | 'inElement'
  | 'expectSeparatorOrEnd'
  | 'expectElement'
  | 'done';

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\n' || char === '\r' || char === '\t' || char === '\uFEFF';
}

/**
 * Splits a streamed JSON array into the texts of its elements.
 *
 * Each element must be a JSON object. Only the element in progress is
 * buffered.
 *
 * @example
 * ```typescript
 * const parser = new ChunkedJsonParser();
 * parser.feed('[{"candidates":[{"content"');   // []
 * parser.feed(':{"parts":[{"text":"Hi"}]}}]}'); // ['{"candidates":[...]}']
 * parser.feed(']');                              // []
 * parser.finish();                               // ok, array closed
 * ```
 */
export class ChunkedJsonParser {
  private state: ParserState = 'expectArrayStart';
  private partial = '';
  private depth = 0;
  private inString = false;
  private escapeNext = false;
  private offset = 0;

  /** Whether the closing `]` has been seen */
  get isComplete(): boolean {
    return this.state === 'done';
  }

  /**
   * Feeds the next chunk of text.
   *
   * @returns texts of the elements completed by this chunk, in order
   * @throws {SerializationError} on text that cannot be part of the array
   */
  feed(chunk: string): string[] {
    const elements: string[] = [];
    let elementStart = this.state === 'inElement' ? 0 : -1;

    for (let i = 0; i < chunk.length; i++) {
      const char = chunk[i];

      if (this.state === 'inElement') {
        if (this.scanElementChar(char)) {
          elements.push(this.partial + chunk.slice(elementStart, i + 1));
          this.partial = '';
          elementStart = -1;
          this.state = 'expectSeparatorOrEnd';
        }
        continue;
      }

      if (isWhitespace(char)) {
        continue;
      }

      switch (this.state) {
        case 'expectArrayStart':
          if (char !== '[') {
            throw this.unexpected(char, i, 'expected "["');
          }
          this.state = 'expectFirstElementOrEnd';
          break;

        case 'expectFirstElementOrEnd':
        case 'expectElement':
          if (char === ']' && this.state === 'expectFirstElementOrEnd') {
            this.state = 'done';
          } else if (char === '{') {
            this.state = 'inElement';
            this.depth = 1;
            elementStart = i;
          } else {
            throw this.unexpected(char, i, 'expected an object');
          }
          break;

        case 'expectSeparatorOrEnd':
          if (char === ',') {
            this.state = 'expectElement';
          } else if (char === ']') {
            this.state = 'done';
          } else {
            throw this.unexpected(char, i, 'expected "," or "]"');
          }
          break;

        case 'done':
          throw this.unexpected(char, i, 'data after the end of the array');
      }
    }

    if (this.state === 'inElement' && elementStart >= 0) {
      this.partial += chunk.slice(elementStart);
    }
    this.offset += chunk.length;

    return elements;
  }

  /**
   * Signals the end of input.
   *
   * @throws {SerializationError} if the array was not closed
   */
  finish(): void {
    if (this.state === 'done') {
      return;
    }

    const where =
      this.state === 'inElement'
        ? 'inside an element'
        : this.state === 'expectArrayStart'
          ? 'before the array started'
          : 'before the closing "]"';
    throw new SerializationError(`Stream ended ${where}`, {
      details: { offset: this.offset, pendingLength: this.partial.length },
    });
  }

  /**
   * Reset the parser to initial state.
   */
  reset(): void {
    this.state = 'expectArrayStart';
    this.partial = '';
    this.depth = 0;
    this.inString = false;
    this.escapeNext = false;
    this.offset = 0;
  }

  /**
   * Advances string, escape and depth tracking by one character of the
   * current element. Returns true when the element is complete.
   */
  private scanElementChar(char: string): boolean {
    if (this.escapeNext) {
      this.escapeNext = false;
      return false;
    }

    if (this.inString) {
      if (char === '\\') {
        this.escapeNext = true;
      } else if (char === '"') {
        this.inString = false;
      }
      return false;
    }

    switch (char) {
      case '"':
        this.inString = true;
        return false;
      case '{':
      case '[':
        this.depth++;
        return false;
      case '}':
      case ']':
        this.depth--;
        return this.depth === 0;
      default:
        return false;
    }
  }

  private unexpected(char: string, index: number, expectation: string): SerializationError {
    return new SerializationError(
      `Unexpected ${JSON.stringify(char)} at offset ${this.offset + index} of stream: ${expectation}`
    );
  }
}
