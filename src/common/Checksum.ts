/**
 * CRC-32 (IEEE 802.3, reflected polynomial 0xEDB88320).
 */
export function crc32(buffer: Buffer): number {
  let crc = 0xFFFFFFFF;
  for (let i = 0; i < buffer.length; i++) {
    const byte = buffer[i];
    if (byte === undefined) break;
    crc ^= byte;
    for (let j = 0; j < 8; j++) {
      crc = (crc >>> 1) ^ (0xEDB88320 & -(crc & 1));
    }
  }
  return ~crc >>> 0;
}
