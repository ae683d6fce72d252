import { ServerConfig, DEFAULT_CONFIG, resolveServerConfig } from '../common/Config';
import { ConfigError } from '../common/Errors';

const NUMBER_PATTERN = /^\d+$/;

export interface CLIOptions {
  readonly config: ServerConfig;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const config = resolveServerConfig({
      host: this.getString('--host') ?? DEFAULT_CONFIG.host,
      tcpPort: this.getNumber('--port') ?? DEFAULT_CONFIG.tcpPort,
      httpPort: this.getNumber('--http-port') ?? DEFAULT_CONFIG.httpPort,
      enableHttp: !this.hasFlag('--disable-http'),
      snapshotPath: this.getString('--snapshot-path') ?? DEFAULT_CONFIG.snapshotPath,
      snapshotIntervalMs: this.getNumber('--snapshot-interval-ms') ?? DEFAULT_CONFIG.snapshotIntervalMs,
      snapshotOnShutdown: !this.hasFlag('--no-snapshot-on-shutdown'),
      restoreFallbackEmpty: this.hasFlag('--restore-fallback-empty'),
      sweepIntervalMs: this.getNumber('--sweep-interval-ms') ?? DEFAULT_CONFIG.sweepIntervalMs,
      maxConnections: this.getNumber('--max-clients') ?? DEFAULT_CONFIG.maxConnections,
    });

    return { config, help: false };
  }

  private getString(flag: string): string | undefined {
    const prefixed = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (prefixed !== undefined) {
      return prefixed.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    if (!NUMBER_PATTERN.test(str)) {
      throw new ConfigError(`Invalid number for ${flag}: ${str}`);
    }
    return Number(str);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
SnapKV

Usage: node dist/index.js [options]

Options:
  --help, -h                  Show this help message

Network Options:
  --host=HOST                 Listen address (default: 0.0.0.0)
  --port=PORT                 TCP command port (default: 6380)
  --http-port=PORT            HTTP admin port (default: 3000)
  --disable-http              Do not start the HTTP admin API
  --max-clients=N             Maximum concurrent TCP clients (default: 64)

Persistence Options:
  --snapshot-path=PATH        Snapshot file (default: ./data/dump.snap)
  --snapshot-interval-ms=MS   Periodic snapshot interval, 0 disables (default: 60000)
  --no-snapshot-on-shutdown   Skip the final snapshot on SIGINT/SIGTERM
  --restore-fallback-empty    Start empty if the snapshot is corrupt instead of exiting

Expiration Options:
  --sweep-interval-ms=MS      Expired-key sweep interval, 0 disables (default: 1000)

Examples:
  # Defaults
  node dist/index.js

  # Snapshot every 5 seconds to /var/lib/snapkv
  node dist/index.js --snapshot-path=/var/lib/snapkv/dump.snap --snapshot-interval-ms=5000

  # TCP only, on port 7000
  node dist/index.js --port=7000 --disable-http
`);
  }
}
