import * as net from 'net';
import { Reply } from '../commands/Reply';
import { CommandError } from '../common/Errors';
import { fromByteString, toByteString } from '../common/Bytes';
import { RESPProtocol, ParsedReply } from './RESPProtocol';

export interface TCPClientConfig {
  readonly host: string;
  readonly port: number;
  readonly timeout?: number;
}

interface PendingReply {
  resolve: (reply: Reply) => void;
  reject: (err: Error) => void;
}

export class TCPClient {
  private readonly config: TCPClientConfig;
  private socket: net.Socket | null = null;
  private connected: boolean = false;
  private buffer: Buffer = Buffer.alloc(0);
  private pendingReplies: PendingReply[] = [];

  constructor(config: TCPClientConfig) {
    this.config = {
      timeout: 5000,
      ...config,
    };
  }

  public async connect(): Promise<void> {
    if (this.connected) {
      throw new Error('TCPClient: Already connected');
    }

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;

      socket.setTimeout(this.config.timeout ?? 5000);

      socket.on('connect', () => {
        this.connected = true;
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.handleData(chunk);
      });

      socket.on('error', (err) => {
        this.rejectAllPending(err);
        reject(err);
      });

      socket.on('close', () => {
        this.connected = false;
        this.rejectAllPending(new Error('Connection closed'));
      });

      socket.on('timeout', () => {
        socket.destroy();
        this.rejectAllPending(new Error('Connection timeout'));
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!this.connected || socket === null) {
      return;
    }

    return new Promise((resolve) => {
      socket.end(() => {
        this.connected = false;
        this.socket = null;
        resolve();
      });
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Send one command and wait for its reply. Arguments and bulk replies are
   * raw byte strings, and error replies resolve normally. The typed helpers
   * below take and return UTF-8 text and throw on error replies.
   */
  public execute(...args: string[]): Promise<Reply> {
    const socket = this.ensureConnected();

    return new Promise((resolve, reject) => {
      this.pendingReplies.push({ resolve, reject });
      socket.write(RESPProtocol.encodeCommand(args));
    });
  }

  public async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const args = ['SET', toByteString(key), toByteString(value)];
    if (ttlMs !== undefined) {
      args.push(String(ttlMs));
    }
    this.expectKind(await this.execute(...args), 'status');
  }

  public async get(key: string): Promise<string | null> {
    const reply = await this.execute('GET', toByteString(key));
    if (reply.kind === 'nil') {
      return null;
    }
    return fromByteString(this.expectKind(reply, 'bulk').value);
  }

  public async del(key: string): Promise<number> {
    return this.expectKind(await this.execute('DEL', toByteString(key)), 'integer').value;
  }

  public async exists(key: string): Promise<boolean> {
    return this.expectKind(await this.execute('EXISTS', toByteString(key)), 'integer').value === 1;
  }

  private expectKind<K extends Reply['kind']>(reply: Reply, kind: K): Extract<Reply, { kind: K }> {
    if (reply.kind === 'error') {
      throw new CommandError(reply.message);
    }
    if (!this.isKind(reply, kind)) {
      throw new Error(`TCPClient: Expected ${kind} reply, got ${reply.kind}`);
    }
    return reply;
  }

  private isKind<K extends Reply['kind']>(reply: Reply, kind: K): reply is Extract<Reply, { kind: K }> {
    return reply.kind === kind;
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length > 0) {
      let result: ParsedReply | null;
      try {
        result = RESPProtocol.parseReply(this.buffer);
      } catch (err) {
        this.socket?.destroy();
        this.rejectAllPending(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      if (result === null) {
        break;
      }

      const pending = this.pendingReplies.shift();
      if (pending) {
        pending.resolve(result.reply);
      }

      this.buffer = this.buffer.subarray(result.bytesConsumed);
    }
  }

  private rejectAllPending(err: Error): void {
    for (const pending of this.pendingReplies) {
      pending.reject(err);
    }
    this.pendingReplies = [];
  }

  private ensureConnected(): net.Socket {
    if (!this.connected || this.socket === null) {
      throw new Error('TCPClient: Not connected');
    }
    return this.socket;
  }
}
