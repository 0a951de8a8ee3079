import { Transform, type TransformCallback } from 'node:stream';

const NEWLINE = 0x0a;

/**
 * Stream transform that drops the trailing newlines of its input.
 *
 * Newlines at the end of a chunk are held back until more content arrives, so
 * blank lines inside the output pass through and only the final run is lost.
 */
export function createChompStream(): Transform {
  let pending = 0;

  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      let end = chunk.length;
      while (end > 0 && chunk[end - 1] === NEWLINE) {
        end--;
      }
      if (end === 0) {
        pending += chunk.length;
        callback();
        return;
      }
      if (pending > 0) {
        this.push(Buffer.alloc(pending, NEWLINE));
      }
      pending = chunk.length - end;
      callback(null, chunk.subarray(0, end));
    },
  });
}
