import express, { Request, Response, NextFunction } from 'express';
import { IKeyspaceStore } from '../interfaces/Keyspace';
import { ICommandInterpreter } from '../commands/ICommandInterpreter';
import { ISnapshotManager } from '../storage/snapshot';
import { IExpirationSweeper } from '../engine/expiration';
import { errorMessage } from '../common/Errors';
import { fromByteString, toByteString } from '../common/Bytes';

export interface HTTPServerDependencies {
  readonly store: IKeyspaceStore;
  readonly interpreter: ICommandInterpreter;
  readonly snapshotManager: ISnapshotManager;
  readonly sweeper?: IExpirationSweeper;
  /** Live TCP connection count, for /stats. */
  readonly connectionCount?: () => number;
}

/**
 * Admin and debugging surface. Key routes go through the command
 * interpreter so they share the TCP protocol's semantics exactly.
 * Keys and values cross this API as UTF-8 text.
 */
export class HTTPServer {
  private readonly app: express.Application;
  private readonly deps: HTTPServerDependencies;
  private readonly port: number;
  private readonly host: string | undefined;
  private server: ReturnType<express.Application['listen']> | null = null;
  private boundPort: number;

  constructor(deps: HTTPServerDependencies, port: number, host?: string) {
    this.deps = deps;
    this.port = port;
    this.host = host;
    this.boundPort = port;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/stats', this.handleStats.bind(this));

    this.app.post('/snapshot', this.handleSnapshot.bind(this));

    this.app.get('/keys/:key', this.handleGet.bind(this));

    this.app.put('/keys/:key', this.handlePut.bind(this));

    this.app.delete('/keys/:key', this.handleDelete.bind(this));
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      console.error('HTTPServer: Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private handleStats(_req: Request, res: Response): void {
    res.json({
      keys: this.deps.store.size(),
      sequence: this.deps.store.getSequence(),
      connections: this.deps.connectionCount?.() ?? 0,
      snapshot: this.deps.snapshotManager.getStats(),
      sweeper: this.deps.sweeper?.getStats() ?? null,
    });
  }

  private async handleSnapshot(_req: Request, res: Response): Promise<void> {
    try {
      const result = await this.deps.snapshotManager.capture();
      res.json({
        status: result.status,
        sequence: result.sequence,
        entryCount: result.entryCount,
        bytes: result.bytes,
      });
    } catch (err) {
      console.error(`HTTPServer: Snapshot failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  }

  private handleGet(req: Request, res: Response): void {
    const key = req.params.key ?? '';
    const reply = this.deps.interpreter.execute(['GET', toByteString(key)]);

    switch (reply.kind) {
      case 'bulk':
        res.json({ key, value: fromByteString(reply.value) });
        return;
      case 'nil':
        res.status(404).json({ error: 'Key not found', key });
        return;
      case 'error':
        res.status(400).json({ error: reply.message });
        return;
      default:
        res.status(500).json({ error: 'Internal server error' });
    }
  }

  /**
   * Request body: { "value": "v", "ttlMs": 1000 }
   */
  private handlePut(req: Request, res: Response): void {
    const key = req.params.key ?? '';
    const body: unknown = req.body;
    const value = this.readField(body, 'value');
    const ttlMs = this.readField(body, 'ttlMs');

    if (value === undefined || value === null) {
      res.status(400).json({ error: 'Invalid value: must not be null or undefined' });
      return;
    }

    const request = ['SET', toByteString(key), toByteString(String(value))];
    if (ttlMs !== undefined && ttlMs !== null) {
      request.push(String(ttlMs));
    }

    const reply = this.deps.interpreter.execute(request);
    if (reply.kind === 'error') {
      res.status(400).json({ error: reply.message });
      return;
    }

    res.json({ success: true });
  }

  private handleDelete(req: Request, res: Response): void {
    const key = req.params.key ?? '';
    const reply = this.deps.interpreter.execute(['DEL', toByteString(key)]);

    if (reply.kind !== 'integer') {
      res.status(500).json({ error: 'Internal server error' });
      return;
    }

    res.json({ removed: reply.value });
  }

  private readField(body: unknown, field: string): unknown {
    if (typeof body !== 'object' || body === null) {
      return undefined;
    }
    return Object.getOwnPropertyDescriptor(body, field)?.value;
  }

  public getPort(): number {
    return this.boundPort;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onListening = (): void => {
        const address = server.address();
        if (address !== null && typeof address === 'object') {
          this.boundPort = address.port;
        }
        console.log(`HTTP server listening on port ${this.boundPort}`);
        resolve();
      };

      const server = this.host === undefined
        ? this.app.listen(this.port, onListening)
        : this.app.listen(this.port, this.host, onListening);
      this.server = server;

      server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          console.log('HTTP server stopped');
          this.server = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
