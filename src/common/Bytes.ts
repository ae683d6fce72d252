/**
 * Keys and values are byte strings: every char code (0-255) stands for one
 * byte, so any byte sequence survives the wire and the snapshot unchanged.
 * Text from callers (JSON bodies, URL params, client helpers) is converted
 * at the edge.
 */

export const BYTE_ENCODING: BufferEncoding = 'latin1';

export function toByteString(text: string): string {
  return Buffer.from(text, 'utf8').toString(BYTE_ENCODING);
}

export function fromByteString(bytes: string): string {
  return Buffer.from(bytes, BYTE_ENCODING).toString('utf8');
}
