import { PassThrough, Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { FramingError } from '../src/errors.js';
import {
  encodeFrame,
  FrameDecoder,
  FrameWriter,
  MAX_HEADER_BYTES,
} from '../src/service/framing.js';

const MAX = 1024 * 1024;

const decodeAll = (decoder: FrameDecoder, chunk: Buffer): unknown[] => {
  const messages: unknown[] = [];
  decoder.feed(chunk, (message) => messages.push(message));
  return messages;
};

const frame = (body: string): Buffer =>
  Buffer.from(
    `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`,
    'utf8',
  );

describe('encodeFrame', () => {
  it('prefixes the UTF-8 body with its byte length', () => {
    const encoded = encodeFrame({ jsonrpc: '2.0', method: 'exit' });
    expect(encoded.toString('utf8')).toBe(
      'Content-Length: 33\r\n\r\n{"jsonrpc":"2.0","method":"exit"}',
    );
  });

  it('counts bytes, not characters', () => {
    const encoded = encodeFrame({
      jsonrpc: '2.0',
      method: 'note',
      params: 'é',
    });
    const body = '{"jsonrpc":"2.0","method":"note","params":"é"}';
    expect(body.length).toBe(46);
    expect(encoded.toString('utf8')).toBe(`Content-Length: 47\r\n\r\n${body}`);
  });

  it('frames any JSON value', () => {
    expect(encodeFrame([1, 2]).toString('utf8')).toBe(
      'Content-Length: 5\r\n\r\n[1,2]',
    );
    expect(encodeFrame(null).toString('utf8')).toBe(
      'Content-Length: 4\r\n\r\nnull',
    );
  });

  it('refuses values JSON cannot represent', () => {
    expect(() => encodeFrame(undefined)).toThrow(
      'cannot frame a value of type undefined',
    );
  });
});

describe('FrameDecoder', () => {
  it('decodes a single complete frame', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(decodeAll(decoder, frame('{"jsonrpc":"2.0","id":1,"result":null}'))).toEqual(
      [{ jsonrpc: '2.0', id: 1, result: null }],
    );
    expect(decoder.isAwaitingBody).toBe(false);
  });

  it('decodes several frames delivered in one chunk', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    const chunk = Buffer.concat([
      frame('{"id":1}'),
      frame('{"id":2}'),
      frame('{"id":3}'),
    ]);
    expect(decodeAll(decoder, chunk)).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
  });

  it('reassembles a frame split across chunks at every offset', () => {
    const bytes = frame('{"jsonrpc":"2.0","method":"x","params":{"é":[1,2]}}');
    for (let split = 1; split < bytes.length; split += 1) {
      const decoder = new FrameDecoder({ maxMessageBytes: MAX });
      expect(decodeAll(decoder, bytes.subarray(0, split))).toEqual([]);
      expect(decodeAll(decoder, bytes.subarray(split))).toEqual([
        { jsonrpc: '2.0', method: 'x', params: { é: [1, 2] } },
      ]);
    }
  });

  it('reports a body in progress only after the header block is read', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    decodeAll(decoder, Buffer.from('Content-Length: 10\r\n'));
    expect(decoder.isAwaitingBody).toBe(false);
    decodeAll(decoder, Buffer.from('\r\n{"a"'));
    expect(decoder.isAwaitingBody).toBe(true);
  });

  it('ignores other headers and matches Content-Length case-insensitively', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    const input = Buffer.from(
      'content-type: application/vscode-jsonrpc; charset=utf-8\r\n' +
        'CONTENT-LENGTH: 8\r\n\r\n{"id":7}',
    );
    expect(decodeAll(decoder, input)).toEqual([{ id: 7 }]);
  });

  it('accepts bare LF line endings', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(decodeAll(decoder, Buffer.from('Content-Length: 8\n\n{"id":9}'))).toEqual([
      { id: 9 },
    ]);
  });

  it('rejects a header block without Content-Length', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(() =>
      decodeAll(decoder, Buffer.from('Content-Type: text/plain\r\n\r\n{}')),
    ).toThrow(new FramingError('missing Content-Length header'));
  });

  it('rejects a non-numeric Content-Length', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(() =>
      decodeAll(decoder, Buffer.from('Content-Length: 12abc\r\n\r\n')),
    ).toThrow("invalid Content-Length: '12abc'");
  });

  it('rejects a declared size above the cap before the body arrives', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: 100 });
    expect(() =>
      decodeAll(decoder, Buffer.from('Content-Length: 101\r\n\r\n')),
    ).toThrow('LSP message size 101 exceeds maximum of 100');
  });

  it('accepts a body exactly at the cap', () => {
    const body = `{"p":"${'x'.repeat(92)}"}`;
    expect(body.length).toBe(100);
    const decoder = new FrameDecoder({ maxMessageBytes: 100 });
    expect(decodeAll(decoder, frame(body))).toEqual([{ p: 'x'.repeat(92) }]);
  });

  it('rejects a header block that never terminates', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(() =>
      decodeAll(decoder, Buffer.alloc(MAX_HEADER_BYTES + 1, 0x41)),
    ).toThrow(`LSP header block exceeds ${MAX_HEADER_BYTES} bytes`);
  });

  it('rejects a body that is not JSON', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    expect(() => decodeAll(decoder, frame('{not json'))).toThrow(
      'invalid JSON-RPC message',
    );
  });

  it('passes through bodies that are JSON but not objects', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    const chunk = Buffer.concat([
      frame('[1,2]'),
      frame('42'),
      frame('"text"'),
      frame('null'),
      frame('{"id":1}'),
    ]);
    expect(decodeAll(decoder, chunk)).toEqual([
      [1, 2],
      42,
      'text',
      null,
      { id: 1 },
    ]);
  });

  it('delivers the frames before a bad one in the same chunk', () => {
    const decoder = new FrameDecoder({ maxMessageBytes: MAX });
    const delivered: unknown[] = [];
    const chunk = Buffer.concat([
      frame('{"jsonrpc":"2.0","id":1,"result":"ok"}'),
      frame('{broken'),
    ]);

    expect(() =>
      decoder.feed(chunk, (message) => delivered.push(message)),
    ).toThrow('invalid JSON-RPC message');
    expect(delivered).toEqual([{ jsonrpc: '2.0', id: 1, result: 'ok' }]);
  });

  it('property-based: any chunking yields the same messages', () => {
    fc.assert(
      fc.property(
        fc.array(fc.record({ id: fc.integer(), method: fc.string() }), {
          minLength: 1,
          maxLength: 5,
        }),
        fc.array(fc.integer({ min: 1, max: 64 }), { minLength: 1 }),
        (messages, sizes) => {
          const stream = Buffer.concat(
            messages.map((message) => frame(JSON.stringify(message))),
          );
          const decoder = new FrameDecoder({ maxMessageBytes: MAX });
          const decoded: unknown[] = [];
          let offset = 0;
          let index = 0;
          while (offset < stream.length) {
            const size = sizes[index % sizes.length] ?? 1;
            decoded.push(...decodeAll(decoder, stream.subarray(offset, offset + size)));
            offset += size;
            index += 1;
          }
          expect(decoded).toEqual(messages);
        },
      ),
    );
  });

  it('property-based: decodes whatever encodeFrame framed', () => {
    fc.assert(
      fc.property(
        fc.array(fc.jsonValue(), { minLength: 1, maxLength: 4 }),
        fc.array(fc.integer({ min: 1, max: 64 }), { minLength: 1 }),
        (values, sizes) => {
          const frames = values.map((value) => encodeFrame(value));
          const stream = Buffer.concat(frames);
          const decoder = new FrameDecoder({ maxMessageBytes: MAX });
          const decoded: unknown[] = [];
          let offset = 0;
          let index = 0;
          while (offset < stream.length) {
            const size = sizes[index % sizes.length] ?? 1;
            decoder.feed(stream.subarray(offset, offset + size), (message) =>
              decoded.push(message),
            );
            offset += size;
            index += 1;
          }

          expect(decoded).toHaveLength(values.length);
          decoded.forEach((message, i) => {
            expect(encodeFrame(message)).toEqual(frames[i]);
            expect(JSON.stringify(message)).toBe(JSON.stringify(values[i]));
          });
          expect(decoder.isAwaitingBody).toBe(false);
        },
      ),
    );
  });
});

describe('FrameWriter', () => {
  it('writes each message as one contiguous frame', async () => {
    const sink = new PassThrough();
    const chunks: Buffer[] = [];
    sink.on('data', (chunk: Buffer) => chunks.push(chunk));

    const writer = new FrameWriter(sink);
    await Promise.all([
      writer.write({ jsonrpc: '2.0', id: 1, method: 'a' }),
      writer.write({ jsonrpc: '2.0', id: 2, method: 'b' }),
    ]);
    await new Promise((resolve) => setImmediate(resolve));

    expect(Buffer.concat(chunks).toString('utf8')).toBe(
      'Content-Length: 37\r\n\r\n{"jsonrpc":"2.0","id":1,"method":"a"}' +
        'Content-Length: 37\r\n\r\n{"jsonrpc":"2.0","id":2,"method":"b"}',
    );
  });

  it('rejects when the underlying stream fails the write', async () => {
    const broken = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    broken.on('error', () => undefined);

    const writer = new FrameWriter(broken);
    await expect(
      writer.write({ jsonrpc: '2.0', method: 'exit' }),
    ).rejects.toThrow('EPIPE');
  });
});
