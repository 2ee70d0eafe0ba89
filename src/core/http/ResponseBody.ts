// src/core/http/ResponseBody.ts

import { Readable, Transform, pipeline } from 'stream';
import type { TransformCallback } from 'stream';
import { buffer as readAll } from 'stream/consumers';
import { EngineError, ResponseTooLargeError } from '../../utils/errors';

type BodyState =
  | { kind: 'stream'; source: Readable }
  | { kind: 'buffered'; bytes: Buffer }
  | { kind: 'detached'; reason: string };

/**
 * A response body that starts as a one-shot stream and becomes a re-readable
 * buffer once `buffer()` has run. Concurrent readers share a single drain.
 */
export class ResponseBody {
  private state: BodyState;
  private draining?: Promise<Buffer>;

  constructor(source: Readable | Buffer | string = Buffer.alloc(0)) {
    if (source instanceof Readable) {
      this.state = { kind: 'stream', source };
    } else {
      this.state = { kind: 'buffered', bytes: typeof source === 'string' ? Buffer.from(source) : source };
    }
  }

  get isMaterialized(): boolean {
    return this.state.kind === 'buffered';
  }

  /** Materialized bytes, without reading; undefined while still a stream. */
  bytes(): Buffer | undefined {
    return this.state.kind === 'buffered' ? this.state.bytes : undefined;
  }

  async buffer(): Promise<Buffer> {
    const state = this.state;
    if (state.kind === 'buffered') return state.bytes;
    if (state.kind === 'detached') {
      throw new EngineError(`Response body ${state.reason}`, 'BODY_UNAVAILABLE');
    }

    if (!this.draining) {
      this.draining = readAll(state.source).then((bytes) => {
        this.state = { kind: 'buffered', bytes };
        return bytes;
      });
    }
    return this.draining;
  }

  async text(): Promise<string> {
    return (await this.buffer()).toString('utf8');
  }

  async json<T = unknown>(): Promise<T> {
    return JSON.parse(await this.text());
  }

  /**
   * A readable view of the body. Once materialized, every call returns a
   * fresh stream over the same bytes; before that the underlying stream is
   * handed over and the body cannot be read again.
   */
  stream(): Readable {
    const state = this.state;
    if (state.kind === 'buffered') {
      return Readable.from([state.bytes], { objectMode: false });
    }
    if (state.kind === 'detached') {
      throw new EngineError(`Response body ${state.reason}`, 'BODY_UNAVAILABLE');
    }
    this.state = { kind: 'detached', reason: 'was handed off as a stream' };
    return state.source;
  }

  /** Frees the underlying stream of a response nobody will read. */
  release(): void {
    if (this.state.kind === 'stream') {
      this.state.source.destroy();
      this.state = { kind: 'detached', reason: 'was released' };
    }
  }

  /**
   * Returns a body that fails with ResponseTooLargeError once more than
   * `maxBytes` flow through it, whether this body is a stream or a buffer.
   */
  limit(maxBytes: number): ResponseBody {
    const source = this.stream();
    const bounded = new ByteLimit(maxBytes);
    pipeline(source, bounded, (error) => {
      if (error) bounded.destroy(error);
    });
    return new ResponseBody(bounded);
  }
}

class ByteLimit extends Transform {
  private seen = 0;

  constructor(private readonly maxBytes: number) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.seen += chunk.length;
    if (this.seen > this.maxBytes) {
      callback(new ResponseTooLargeError(this.maxBytes));
      return;
    }
    callback(null, chunk);
  }
}
