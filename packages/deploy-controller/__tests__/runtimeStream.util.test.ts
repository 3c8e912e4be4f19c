import { PassThrough } from 'node:stream';

import { describe, it, expect } from 'vitest';

import { demuxLogBuffer, mergeDemuxed } from '../src/infra/runtime/runtimeStream.util';

function frame(streamType: 1 | 2, text: string): Buffer {
  const body = Buffer.from(text, 'utf8');
  const header = Buffer.alloc(8);
  header[0] = streamType;
  header.writeUInt32BE(body.length, 4);
  return Buffer.concat([header, body]);
}

describe('demuxLogBuffer', () => {
  it('joins stdout and stderr frames in order', () => {
    const payload = Buffer.concat([frame(1, 'listening on :8000\n'), frame(2, 'worker booted\n')]);
    expect(demuxLogBuffer(payload)).toBe('listening on :8000\nworker booted\n');
  });

  it('returns a TTY payload unchanged', () => {
    expect(demuxLogBuffer(Buffer.from('plain output\n'))).toBe('plain output\n');
  });

  it('keeps what is present of a truncated frame', () => {
    const full = frame(1, 'abcdefghij');
    expect(demuxLogBuffer(full.subarray(0, 11))).toBe('abc');
  });
});

describe('mergeDemuxed', () => {
  it('forwards demuxed output and ends with the source', async () => {
    const source = new PassThrough();
    const merged = mergeDemuxed(source, (stream, stdout) => {
      stream.on('data', (chunk: Buffer) => stdout.write(chunk));
    });

    source.write('first ');
    source.end('second');

    const chunks: string[] = [];
    for await (const chunk of merged) chunks.push(String(chunk));
    expect(chunks.join('')).toBe('first second');
  });

  it('releases the source when the merged stream is destroyed', async () => {
    const source = new PassThrough();
    const merged = mergeDemuxed(source, () => undefined);

    merged.destroy();
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(source.destroyed).toBe(true);
  });
});
