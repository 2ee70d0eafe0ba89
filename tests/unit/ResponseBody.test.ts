// tests/unit/ResponseBody.test.ts

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { buffer as readAll } from 'stream/consumers';
import { ResponseBody } from '../../src/core/http/ResponseBody';
import { EngineError, ResponseTooLargeError } from '../../src/utils/errors';

function chunked(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

describe('ResponseBody', () => {
  it('should read a stream once and serve the bytes again afterwards', async () => {
    const body = new ResponseBody(chunked('{"id":', '42}'));

    expect(body.isMaterialized).toBe(false);
    expect(body.bytes()).toBeUndefined();

    expect(await body.text()).toBe('{"id":42}');
    expect(body.isMaterialized).toBe(true);
    expect(await body.json()).toEqual({ id: 42 });
    expect(body.bytes()?.toString()).toBe('{"id":42}');
  });

  it('should share one drain between concurrent readers', async () => {
    const body = new ResponseBody(chunked('a', 'b', 'c'));
    const [first, second] = await Promise.all([body.buffer(), body.buffer()]);

    expect(first).toBe(second);
    expect(first.toString()).toBe('abc');
  });

  it('should accept a string or buffer as an already materialized body', async () => {
    expect(new ResponseBody('cached').isMaterialized).toBe(true);
    expect(await new ResponseBody(Buffer.from('raw')).text()).toBe('raw');
    expect(await new ResponseBody().text()).toBe('');
  });

  it('should give a fresh stream per call once buffered', async () => {
    const body = new ResponseBody('again');

    expect((await readAll(body.stream())).toString()).toBe('again');
    expect((await readAll(body.stream())).toString()).toBe('again');
  });

  it('should hand over an unread stream only once', async () => {
    const body = new ResponseBody(chunked('once'));

    expect((await readAll(body.stream())).toString()).toBe('once');
    expect(() => body.stream()).toThrow('Response body was handed off as a stream');
    await expect(body.text()).rejects.toBeInstanceOf(EngineError);
  });

  it('should destroy the stream on release', async () => {
    const source = chunked('unused');
    const body = new ResponseBody(source);

    body.release();

    expect(source.destroyed).toBe(true);
    await expect(body.buffer()).rejects.toThrow('Response body was released');
  });

  it('should leave a buffered body readable after release', async () => {
    const body = new ResponseBody('kept');
    body.release();

    expect(await body.text()).toBe('kept');
  });

  describe('limit', () => {
    it('should pass bodies within the limit through unchanged', async () => {
      const body = new ResponseBody(chunked('12345', '678')).limit(8);
      expect(await body.text()).toBe('12345678');
    });

    it('should fail once more than maxBytes have been read', async () => {
      const body = new ResponseBody(chunked('12345', '6789')).limit(8);

      const error = await body.buffer().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ResponseTooLargeError);
      expect(error).toMatchObject({ maxBytes: 8, message: 'Response body exceeds 8 bytes' });
    });

    it('should bound an already buffered body', async () => {
      const body = new ResponseBody('0123456789').limit(4);
      await expect(body.text()).rejects.toBeInstanceOf(ResponseTooLargeError);
    });
  });
});
