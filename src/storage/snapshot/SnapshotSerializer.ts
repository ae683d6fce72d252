import { crc32 } from '../../common/Checksum';
import { Entry } from '../../common/Types';
import { SnapshotCorruptError } from '../../common/Errors';
import { BYTE_ENCODING } from '../../common/Bytes';
import {
  Snapshot,
  SNAPSHOT_MAGIC,
  SNAPSHOT_VERSION,
  HEADER_SIZE,
  FOOTER_SIZE,
  FLAG_HAS_EXPIRY,
} from './SnapshotTypes';

export class SnapshotSerializer {

  public static calculateRecordSize(entry: Entry): number {
    const keyBytes = Buffer.byteLength(entry.key, BYTE_ENCODING);
    const valueBytes = Buffer.byteLength(entry.value, BYTE_ENCODING);
    return 4 + keyBytes + 4 + valueBytes + 1 + (entry.expiresAt !== null ? 8 : 0);
  }

  public static serialize(snapshot: Snapshot): Buffer {
    let recordsSize = 0;
    for (const entry of snapshot.entries) {
      recordsSize += this.calculateRecordSize(entry);
    }

    const buffer = Buffer.allocUnsafe(HEADER_SIZE + recordsSize + FOOTER_SIZE);
    let offset = 0;

    buffer.writeUInt32BE(SNAPSHOT_MAGIC, offset);
    offset += 4;

    buffer.writeUInt16BE(SNAPSHOT_VERSION, offset);
    offset += 2;

    buffer.writeBigUInt64BE(BigInt(snapshot.createdAt), offset);
    offset += 8;

    buffer.writeUInt32BE(snapshot.entries.length, offset);
    offset += 4;

    for (const entry of snapshot.entries) {
      offset = this.writeRecord(buffer, offset, entry);
    }

    buffer.writeBigUInt64BE(BigInt(snapshot.sequence), offset);
    offset += 8;

    buffer.writeUInt32BE(crc32(buffer.subarray(0, offset)), offset);

    return buffer;
  }

  public static deserialize(buffer: Buffer): Snapshot {
    if (buffer.length < HEADER_SIZE + FOOTER_SIZE) {
      throw new SnapshotCorruptError(`file too short (${buffer.length} bytes)`);
    }

    const magic = buffer.readUInt32BE(0);
    if (magic !== SNAPSHOT_MAGIC) {
      throw new SnapshotCorruptError('invalid magic number');
    }

    const version = buffer.readUInt16BE(4);
    if (version !== SNAPSHOT_VERSION) {
      throw new SnapshotCorruptError(`unsupported version ${version}`);
    }

    const checksumOffset = buffer.length - 4;
    const stored = buffer.readUInt32BE(checksumOffset);
    const calculated = crc32(buffer.subarray(0, checksumOffset));
    if (stored !== calculated) {
      throw new SnapshotCorruptError('checksum mismatch');
    }

    const createdAt = Number(buffer.readBigUInt64BE(6));
    const count = buffer.readUInt32BE(14);
    const footerOffset = buffer.length - FOOTER_SIZE;

    const entries: Entry[] = [];
    let offset = HEADER_SIZE;

    for (let i = 0; i < count; i++) {
      const [entry, next] = this.readRecord(buffer, offset, footerOffset, i);
      entries.push(entry);
      offset = next;
    }

    if (offset !== footerOffset) {
      throw new SnapshotCorruptError(`${footerOffset - offset} unexpected bytes after last record`);
    }

    const sequence = Number(buffer.readBigUInt64BE(footerOffset));

    return { sequence, createdAt, entries };
  }

  private static writeRecord(buffer: Buffer, start: number, entry: Entry): number {
    let offset = start;

    const keyLen = buffer.write(entry.key, offset + 4, BYTE_ENCODING);
    buffer.writeUInt32BE(keyLen, offset);
    offset += 4 + keyLen;

    const valueLen = buffer.write(entry.value, offset + 4, BYTE_ENCODING);
    buffer.writeUInt32BE(valueLen, offset);
    offset += 4 + valueLen;

    if (entry.expiresAt !== null) {
      buffer.writeUInt8(FLAG_HAS_EXPIRY, offset);
      offset += 1;
      buffer.writeBigUInt64BE(BigInt(entry.expiresAt), offset);
      offset += 8;
    } else {
      buffer.writeUInt8(0, offset);
      offset += 1;
    }

    return offset;
  }

  private static readRecord(
    buffer: Buffer,
    start: number,
    limit: number,
    index: number
  ): [Entry, number] {
    let offset = start;

    const ensure = (bytes: number): void => {
      if (offset + bytes > limit) {
        throw new SnapshotCorruptError(`record ${index} overruns the footer`);
      }
    };

    ensure(4);
    const keyLen = buffer.readUInt32BE(offset);
    offset += 4;

    ensure(keyLen);
    const key = buffer.toString(BYTE_ENCODING, offset, offset + keyLen);
    offset += keyLen;

    ensure(4);
    const valueLen = buffer.readUInt32BE(offset);
    offset += 4;

    ensure(valueLen);
    const value = buffer.toString(BYTE_ENCODING, offset, offset + valueLen);
    offset += valueLen;

    ensure(1);
    const flags = buffer.readUInt8(offset);
    offset += 1;

    let expiresAt: number | null = null;
    if ((flags & FLAG_HAS_EXPIRY) !== 0) {
      ensure(8);
      expiresAt = Number(buffer.readBigUInt64BE(offset));
      offset += 8;
    }

    return [{ key, value, expiresAt }, offset];
  }
}
