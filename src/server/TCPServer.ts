import * as net from 'net';
import { ITCPServer } from './ITCPServer';
import { ICommandInterpreter } from '../commands/ICommandInterpreter';
import { Replies } from '../commands/Reply';
import { ConnectionSession } from './ConnectionSession';
import { RESPProtocol } from './RESPProtocol';

export interface TCPServerConfig {
  readonly port: number;
  readonly host?: string;
  readonly maxConnections: number;
  readonly maxRequestBytes: number;
}

export class TCPServer implements ITCPServer {
  private readonly interpreter: ICommandInterpreter;
  private readonly config: TCPServerConfig;
  private server: net.Server | null = null;
  private sessions: Set<ConnectionSession> = new Set();
  /** Every open socket, including rejected ones still flushing their error. */
  private sockets: Set<net.Socket> = new Set();
  private boundPort: number;

  constructor(interpreter: ICommandInterpreter, config: TCPServerConfig) {
    this.interpreter = interpreter;
    this.config = config;
    this.boundPort = config.port;
  }

  public async start(): Promise<void> {
    if (this.server !== null) {
      throw new Error('TCPServer: Already started');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);

      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        server.on('error', (err) => {
          console.error(`TCPServer: Server error: ${err.message}`);
        });

        const address = server.address();
        if (address !== null && typeof address === 'object') {
          this.boundPort = address.port;
        }

        console.log(`TCPServer: Listening on port ${this.boundPort}`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (server === null) {
      return;
    }

    for (const session of this.sessions) {
      session.close();
    }
    this.sessions.clear();

    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    return new Promise((resolve) => {
      server.close(() => {
        this.server = null;
        console.log('TCPServer: Stopped');
        resolve();
      });
    });
  }

  public getPort(): number {
    return this.boundPort;
  }

  public getConnectionCount(): number {
    return this.sessions.size;
  }

  private handleConnection(socket: net.Socket): void {
    const clientId = `${socket.remoteAddress}:${socket.remotePort}`;

    this.sockets.add(socket);
    socket.once('close', () => {
      this.sockets.delete(socket);
    });

    if (this.sessions.size >= this.config.maxConnections) {
      console.warn(`TCPServer: Rejecting ${clientId}, ${this.sessions.size} clients connected`);
      socket.on('error', (err) => {
        console.error(`TCPServer: Socket error - ${clientId}:`, err.message);
      });
      socket.end(RESPProtocol.encodeReply(Replies.error('ERROR: max number of clients reached')), () => {
        socket.destroy();
      });
      return;
    }

    socket.setNoDelay(true);

    const session = new ConnectionSession(socket, this.interpreter, {
      id: clientId,
      maxRequestBytes: this.config.maxRequestBytes,
      onClose: (closed) => {
        this.sessions.delete(closed);
        console.log(`TCPServer: Client disconnected - ${clientId}`);
      },
    });

    this.sessions.add(session);
    console.log(`TCPServer: Client connected - ${clientId}`);

    session.start();
  }
}
