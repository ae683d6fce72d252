import { describe, it, expect } from 'vitest';
import { crc32 } from '../../src/common/Checksum';

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(Buffer.from('123456789', 'ascii'))).toBe(0xcbf43926);
  });

  it('returns 0 for an empty buffer', () => {
    expect(crc32(Buffer.alloc(0))).toBe(0);
  });
});
