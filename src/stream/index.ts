/**
 * lexitree stream reader
 * Buffers chunks as they arrive and parses once the input has ended
 */

import { EventEmitter } from 'events';
import { StringDecoder } from 'string_decoder';
import { Lexer } from '../lexer';
import { Parser } from '../parser';
import type { Value } from '../value';
import { JsonTreeError } from '../types';
import type { ParserOptions } from '../types';

/**
 * Reader events
 */
export interface ReaderEvents {
  value: (value: Value) => void;
  end: () => void;
  error: (error: JsonTreeError) => void;
}

/**
 * Collects text chunks and emits one `value` event per top-level value
 */
export class DocumentReader extends EventEmitter {
  private chunks: string[] = [];
  private options: ParserOptions;
  private ended: boolean = false;

  constructor(options: ParserOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Write data to the reader
   */
  public write(data: string): void {
    if (this.ended) {
      throw new JsonTreeError('Cannot write to ended reader');
    }

    this.chunks.push(data);
  }

  /**
   * End the input and parse what was written
   */
  public end(): void {
    if (this.ended) return;
    this.ended = true;

    try {
      const lexer = new Lexer(this.chunks, this.options);
      const parser = new Parser(lexer, this.options);
      for (const value of parser.parse()) {
        this.emit('value', value);
      }
    } catch (error) {
      this.emit(
        'error',
        error instanceof JsonTreeError
          ? error
          : new JsonTreeError(error instanceof Error ? error.message : String(error))
      );
    } finally {
      this.chunks = [];
      this.emit('end');
    }
  }

  /**
   * Type-safe event listener
   */
  public on<K extends keyof ReaderEvents>(event: K, listener: ReaderEvents[K]): this {
    return super.on(event, listener);
  }

  /**
   * Type-safe event emitter
   */
  public emit<K extends keyof ReaderEvents>(
    event: K,
    ...args: Parameters<ReaderEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Create a document reader
 */
export function createDocumentReader(options?: ParserOptions): DocumentReader {
  return new DocumentReader(options);
}

/**
 * Read every top-level value from an async source of chunks
 */
export async function readDocument(
  stream: AsyncIterable<string | Buffer>,
  options?: ParserOptions
): Promise<Value[]> {
  const reader = new DocumentReader(options);
  const values: Value[] = [];
  const errors: JsonTreeError[] = [];

  reader.on('value', value => values.push(value));
  reader.on('error', error => errors.push(error));

  // Bytes of a character split across chunks are held until the rest arrives
  const decoder = new StringDecoder('utf8');
  for await (const data of stream) {
    reader.write(typeof data === 'string' ? decoder.end() + data : decoder.write(data));
  }
  reader.write(decoder.end());
  reader.end();

  if (errors.length > 0) {
    throw errors[0];
  }
  return values;
}
