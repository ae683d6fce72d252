import { ProtocolError } from '../common/Errors';
import { Reply } from '../commands/Reply';
import { BYTE_ENCODING } from '../common/Bytes';

export enum RESPPrefix {
  SIMPLE_STRING = 0x2b, // +
  ERROR = 0x2d,         // -
  INTEGER = 0x3a,       // :
  BULK_STRING = 0x24,   // $
  ARRAY = 0x2a,         // *
}

export const MAX_BULK_LENGTH = 512 * 1024 * 1024;
export const MAX_ARRAY_LENGTH = 1024 * 1024;
export const MAX_INLINE_LENGTH = 64 * 1024;

const CRLF = Buffer.from('\r\n');
const LF = 0x0a;
const CR = 0x0d;
const INTEGER_PATTERN = /^-?\d+$/;

export interface ParsedRequest {
  /** Command name followed by its arguments; empty for a blank inline line. */
  readonly args: string[];
  readonly bytesConsumed: number;
}

export interface ParsedReply {
  readonly reply: Reply;
  readonly bytesConsumed: number;
}

interface Line {
  readonly text: string;
  readonly next: number;
}

/**
 * RESP framing.
 *
 * Requests arrive either as an array of bulk strings or as an inline
 * whitespace-separated line. Every parse method returns null when the
 * buffer does not yet hold a complete frame, and throws ProtocolError when
 * the bytes can never become one. Arguments and bulk replies are byte
 * strings (see common/Bytes).
 */
export class RESPProtocol {

  public static parseRequest(buffer: Buffer): ParsedRequest | null {
    if (buffer.length === 0) {
      return null;
    }

    if (buffer[0] === RESPPrefix.ARRAY) {
      return this.parseArrayRequest(buffer);
    }

    return this.parseInlineRequest(buffer);
  }

  public static encodeReply(reply: Reply): Buffer {
    switch (reply.kind) {
      case 'status':
        return Buffer.from(`+${this.sanitizeLine(reply.value)}\r\n`, BYTE_ENCODING);
      case 'error':
        return Buffer.from(`-${this.sanitizeLine(reply.message)}\r\n`, BYTE_ENCODING);
      case 'integer':
        return Buffer.from(`:${reply.value}\r\n`, 'ascii');
      case 'nil':
        return Buffer.from('$-1\r\n', 'ascii');
      case 'bulk':
        return this.encodeBulk(reply.value);
      case 'array':
        return Buffer.concat([
          Buffer.from(`*${reply.items.length}\r\n`, 'ascii'),
          ...reply.items.map((item) => this.encodeReply(item)),
        ]);
    }
  }

  public static encodeCommand(args: readonly string[]): Buffer {
    return Buffer.concat([
      Buffer.from(`*${args.length}\r\n`, 'ascii'),
      ...args.map((arg) => this.encodeBulk(arg)),
    ]);
  }

  public static parseReply(buffer: Buffer, start: number = 0): ParsedReply | null {
    if (buffer.length <= start) {
      return null;
    }

    const line = this.readLine(buffer, start + 1);
    if (line === null) {
      return null;
    }

    const prefix = buffer[start];
    const consumed = (end: number): number => end - start;

    switch (prefix) {
      case RESPPrefix.SIMPLE_STRING:
        return { reply: { kind: 'status', value: line.text }, bytesConsumed: consumed(line.next) };

      case RESPPrefix.ERROR:
        return { reply: { kind: 'error', message: line.text }, bytesConsumed: consumed(line.next) };

      case RESPPrefix.INTEGER:
        return {
          reply: { kind: 'integer', value: this.parseInteger(line.text) },
          bytesConsumed: consumed(line.next),
        };

      case RESPPrefix.BULK_STRING: {
        const length = this.parseInteger(line.text);
        if (length === -1) {
          return { reply: { kind: 'nil' }, bytesConsumed: consumed(line.next) };
        }
        const bulk = this.readBulkBody(buffer, line.next, length);
        if (bulk === null) {
          return null;
        }
        return { reply: { kind: 'bulk', value: bulk.text }, bytesConsumed: consumed(bulk.next) };
      }

      case RESPPrefix.ARRAY: {
        const count = this.parseInteger(line.text);
        if (count === -1) {
          return { reply: { kind: 'nil' }, bytesConsumed: consumed(line.next) };
        }

        const items: Reply[] = [];
        let offset = line.next;
        for (let i = 0; i < count; i++) {
          const item = this.parseReply(buffer, offset);
          if (item === null) {
            return null;
          }
          items.push(item.reply);
          offset += item.bytesConsumed;
        }
        return { reply: { kind: 'array', items }, bytesConsumed: consumed(offset) };
      }

      default:
        throw new ProtocolError(`unexpected reply type byte 0x${(prefix ?? 0).toString(16)}`);
    }
  }

  private static parseArrayRequest(buffer: Buffer): ParsedRequest | null {
    const header = this.readLine(buffer, 1);
    if (header === null) {
      return null;
    }

    const count = this.parseInteger(header.text);
    if (count > MAX_ARRAY_LENGTH) {
      throw new ProtocolError('invalid multibulk length');
    }
    if (count <= 0) {
      return { args: [], bytesConsumed: header.next };
    }

    const args: string[] = [];
    let offset = header.next;

    for (let i = 0; i < count; i++) {
      if (offset >= buffer.length) {
        return null;
      }
      if (buffer[offset] !== RESPPrefix.BULK_STRING) {
        throw new ProtocolError(`expected '$', got '${String.fromCharCode(buffer[offset] ?? 0)}'`);
      }

      const lengthLine = this.readLine(buffer, offset + 1);
      if (lengthLine === null) {
        return null;
      }

      const length = this.parseInteger(lengthLine.text);
      if (length < 0 || length > MAX_BULK_LENGTH) {
        throw new ProtocolError('invalid bulk length');
      }

      const bulk = this.readBulkBody(buffer, lengthLine.next, length);
      if (bulk === null) {
        return null;
      }

      args.push(bulk.text);
      offset = bulk.next;
    }

    return { args, bytesConsumed: offset };
  }

  private static parseInlineRequest(buffer: Buffer): ParsedRequest | null {
    const newline = buffer.indexOf(LF);
    if (newline === -1) {
      if (buffer.length > MAX_INLINE_LENGTH) {
        throw new ProtocolError('too big inline request');
      }
      return null;
    }

    const end = newline > 0 && buffer[newline - 1] === CR ? newline - 1 : newline;
    const text = buffer.toString(BYTE_ENCODING, 0, end);
    const args = text.split(/\s+/).filter((part) => part.length > 0);

    return { args, bytesConsumed: newline + 1 };
  }

  /**
   * Reads a CRLF-terminated line starting at `start`.
   */
  private static readLine(buffer: Buffer, start: number): Line | null {
    const end = buffer.indexOf(CRLF, start);
    if (end === -1) {
      if (buffer.length - start > MAX_INLINE_LENGTH) {
        throw new ProtocolError('line too long');
      }
      return null;
    }
    return { text: buffer.toString(BYTE_ENCODING, start, end), next: end + 2 };
  }

  private static readBulkBody(buffer: Buffer, start: number, length: number): Line | null {
    if (length < 0) {
      throw new ProtocolError('invalid bulk length');
    }
    const end = start + length;
    if (buffer.length < end + 2) {
      return null;
    }
    if (buffer[end] !== CR || buffer[end + 1] !== LF) {
      throw new ProtocolError('invalid bulk string termination');
    }
    return { text: buffer.toString(BYTE_ENCODING, start, end), next: end + 2 };
  }

  private static parseInteger(text: string): number {
    if (!INTEGER_PATTERN.test(text)) {
      throw new ProtocolError(`invalid integer '${text}'`);
    }
    return Number(text);
  }

  private static encodeBulk(value: string): Buffer {
    const body = Buffer.from(value, BYTE_ENCODING);
    return Buffer.concat([
      Buffer.from(`$${body.length}\r\n`, 'ascii'),
      body,
      CRLF,
    ]);
  }

  private static sanitizeLine(text: string): string {
    return text.replace(/[\r\n]+/g, ' ');
  }
}
