import { PassThrough, Readable } from 'node:stream';

const HEADER_LEN = 8;

/**
 * Decode a Docker multiplexed log payload (TTY disabled) into text.
 * Each frame: [stream, 0, 0, 0, size(uint32 BE)] followed by `size` bytes.
 * A payload that does not start with a valid header is returned as-is.
 */
export function demuxLogBuffer(payload: Buffer): string {
  const parts: Buffer[] = [];
  let offset = 0;
  while (offset + HEADER_LEN <= payload.length) {
    const streamType = payload[offset];
    if (streamType > 2 || payload[offset + 1] !== 0 || payload[offset + 2] !== 0 || payload[offset + 3] !== 0) {
      return offset === 0 ? payload.toString('utf8') : Buffer.concat([...parts, payload.subarray(offset)]).toString('utf8');
    }
    const size = payload.readUInt32BE(offset + 4);
    const start = offset + HEADER_LEN;
    parts.push(payload.subarray(start, Math.min(start + size, payload.length)));
    offset = start + size;
  }
  return Buffer.concat(parts).toString('utf8');
}

/** Merge stdout and stderr of a multiplexed stream into one text stream. */
export function mergeDemuxed(
  source: NodeJS.ReadableStream,
  demux: (stream: NodeJS.ReadableStream, stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream) => void,
): PassThrough {
  const out = new PassThrough();
  demux(source, out, out);
  source.on('end', () => out.end());
  source.on('error', (error: Error) => out.destroy(error));
  // Closing the merged stream releases the engine connection
  out.on('close', () => {
    if (source instanceof Readable && !source.destroyed) source.destroy();
  });
  return out;
}
