import { ConfigError } from './Errors';

export interface ServerConfig {
  host: string;
  tcpPort: number;
  httpPort: number;
  enableHttp: boolean;
  snapshotPath: string;
  /** 0 disables the periodic snapshot timer. */
  snapshotIntervalMs: number;
  snapshotOnShutdown: boolean;
  /** Start with an empty keyspace instead of refusing to start on a corrupt snapshot. */
  restoreFallbackEmpty: boolean;
  /** 0 disables the background expiration sweep. */
  sweepIntervalMs: number;
  sweepSampleSize: number;
  maxConnections: number;
  maxRequestBytes: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  tcpPort: 6380,
  httpPort: 3000,
  enableHttp: true,
  snapshotPath: './data/dump.snap',
  snapshotIntervalMs: 60_000,
  snapshotOnShutdown: true,
  restoreFallbackEmpty: false,
  sweepIntervalMs: 1_000,
  sweepSampleSize: 200,
  maxConnections: 64,
  maxRequestBytes: 64 * 1024 * 1024,
};

export function resolveServerConfig(config?: Partial<ServerConfig>): ServerConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  validatePort('tcpPort', resolved.tcpPort);
  validatePort('httpPort', resolved.httpPort);

  if (resolved.host.length === 0) {
    throw new ConfigError('host must not be empty');
  }
  if (resolved.snapshotPath.length === 0) {
    throw new ConfigError('snapshotPath must not be empty');
  }
  if (!Number.isInteger(resolved.snapshotIntervalMs) || resolved.snapshotIntervalMs < 0) {
    throw new ConfigError('snapshotIntervalMs must be a non-negative integer');
  }
  if (!Number.isInteger(resolved.sweepIntervalMs) || resolved.sweepIntervalMs < 0) {
    throw new ConfigError('sweepIntervalMs must be a non-negative integer');
  }
  if (!Number.isInteger(resolved.sweepSampleSize) || resolved.sweepSampleSize < 1) {
    throw new ConfigError('sweepSampleSize must be >= 1');
  }
  if (!Number.isInteger(resolved.maxConnections) || resolved.maxConnections < 1) {
    throw new ConfigError('maxConnections must be >= 1');
  }
  if (!Number.isInteger(resolved.maxRequestBytes) || resolved.maxRequestBytes < 1024) {
    throw new ConfigError('maxRequestBytes must be >= 1024');
  }

  return resolved;
}

function validatePort(name: string, port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${name} must be between 0 and 65535`);
  }
}
