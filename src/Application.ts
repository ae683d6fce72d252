import { ServerConfig } from './common/Config';
import { KeyspaceStore } from './storage/keyspace';
import { SnapshotManager } from './storage/snapshot';
import { ExpirationSweeper } from './engine/expiration';
import { CommandInterpreter } from './commands';
import { TCPServer } from './server/TCPServer';
import { HTTPServer } from './server/HTTPServer';

export interface Application {
  store: KeyspaceStore;
  interpreter: CommandInterpreter;
  snapshotManager: SnapshotManager;
  sweeper: ExpirationSweeper;
  tcpServer: TCPServer;
  httpServer: HTTPServer | undefined;
}

export function createApplication(config: ServerConfig): Application {
  const store = new KeyspaceStore();
  const interpreter = new CommandInterpreter(store);

  const snapshotManager = new SnapshotManager(
    { store },
    {
      snapshotPath: config.snapshotPath,
      intervalMs: config.snapshotIntervalMs,
      snapshotOnShutdown: config.snapshotOnShutdown,
      restoreFallbackEmpty: config.restoreFallbackEmpty,
    }
  );

  const sweeper = new ExpirationSweeper(
    { store },
    { intervalMs: config.sweepIntervalMs, sampleSize: config.sweepSampleSize }
  );

  const tcpServer = new TCPServer(interpreter, {
    port: config.tcpPort,
    host: config.host,
    maxConnections: config.maxConnections,
    maxRequestBytes: config.maxRequestBytes,
  });

  const httpServer = config.enableHttp
    ? new HTTPServer(
        {
          store,
          interpreter,
          snapshotManager,
          sweeper,
          connectionCount: () => tcpServer.getConnectionCount(),
        },
        config.httpPort,
        config.host
      )
    : undefined;

  return { store, interpreter, snapshotManager, sweeper, tcpServer, httpServer };
}

/**
 * Restore must finish before the first connection is accepted.
 */
export async function startApplication(app: Application): Promise<void> {
  await app.snapshotManager.restore();

  app.snapshotManager.start();
  app.sweeper.start();

  if (app.httpServer) {
    await app.httpServer.start();
  }

  await app.tcpServer.start();
}

export async function shutdownApplication(app: Application): Promise<void> {
  console.log('\nShutting down gracefully...');

  await app.tcpServer.stop();

  if (app.httpServer) {
    await app.httpServer.stop();
  }

  app.sweeper.stop();
  await app.snapshotManager.stop();

  console.log('Shutdown complete');
}

export function printStartupInfo(config: ServerConfig, app: Application): void {
  console.log('SnapKV - Ready!');
  console.log(`  Keys restored: ${app.store.size()}`);
  console.log(`  TCP: ${config.host}:${app.tcpServer.getPort()}`);

  if (app.httpServer) {
    console.log(`  HTTP API: http://${config.host}:${app.httpServer.getPort()}`);
  }

  console.log(`  Snapshot: ${config.snapshotPath} (every ${config.snapshotIntervalMs}ms)`);
}
