import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, ServerConfig, resolveServerConfig } from '../../src/common/Config';
import { ConfigError } from '../../src/common/Errors';

describe('resolveServerConfig', () => {
  it('fills in defaults', () => {
    expect(resolveServerConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveServerConfig({ tcpPort: 7000 })).toEqual({ ...DEFAULT_CONFIG, tcpPort: 7000 });
  });

  it('accepts port 0 and disabled intervals', () => {
    const config = resolveServerConfig({ tcpPort: 0, snapshotIntervalMs: 0, sweepIntervalMs: 0 });

    expect(config.tcpPort).toBe(0);
    expect(config.snapshotIntervalMs).toBe(0);
    expect(config.sweepIntervalMs).toBe(0);
  });

  it.each<[Partial<ServerConfig>, string]>([
    [{ tcpPort: 70_000 }, 'tcpPort must be between 0 and 65535'],
    [{ httpPort: -1 }, 'httpPort must be between 0 and 65535'],
    [{ host: '' }, 'host must not be empty'],
    [{ snapshotPath: '' }, 'snapshotPath must not be empty'],
    [{ snapshotIntervalMs: -5 }, 'snapshotIntervalMs must be a non-negative integer'],
    [{ sweepIntervalMs: 1.5 }, 'sweepIntervalMs must be a non-negative integer'],
    [{ sweepSampleSize: 0 }, 'sweepSampleSize must be >= 1'],
    [{ maxConnections: 0 }, 'maxConnections must be >= 1'],
    [{ maxRequestBytes: 100 }, 'maxRequestBytes must be >= 1024'],
  ])('rejects %j', (partial, message) => {
    expect(() => resolveServerConfig(partial)).toThrow(ConfigError);
    expect(() => resolveServerConfig(partial)).toThrow(message);
  });
});
