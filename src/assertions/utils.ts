export type Bytes = string | Uint8Array;

const NEWLINE = 0x0a;

/**
 * Normalize a byte string to a Buffer (strings are UTF-8 encoded)
 */
export function toBuffer(value: Bytes): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
}

/**
 * Drop every trailing newline, the way a shell command substitution does
 */
export function trimTrailingNewlines(value: Buffer): Buffer {
  let end = value.length;
  while (end > 0 && value[end - 1] === NEWLINE) {
    end--;
  }
  return value.subarray(0, end);
}
