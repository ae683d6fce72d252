import { Duplex } from 'stream';
import { ICommandInterpreter } from '../commands/ICommandInterpreter';
import { ErrorReply, Reply, Replies } from '../commands/Reply';
import { ProtocolError, errorMessage } from '../common/Errors';
import { RESPProtocol, ParsedRequest } from './RESPProtocol';

export interface ConnectionSessionConfig {
  readonly id: string;
  readonly maxRequestBytes: number;
  readonly onClose?: (session: ConnectionSession) => void;
}

export interface SessionStats {
  readonly id: string;
  readonly commandsProcessed: number;
  readonly errorsReturned: number;
  readonly closed: boolean;
}

const INTERNAL_ERROR = Replies.error('ERROR: internal error');

type Frame = { readonly args: string[] } | { readonly protocolError: ErrorReply };

/**
 * One client connection.
 *
 * Frames are handled strictly one after another: a reply is fully written
 * (or queued behind a drain) before the next frame is parsed, so replies
 * leave in request order. The socket is paused while a batch is processed.
 */
export class ConnectionSession {
  private readonly socket: Duplex;
  private readonly interpreter: ICommandInterpreter;
  private readonly config: ConnectionSessionConfig;

  private buffer: Buffer = Buffer.alloc(0);
  private processing: boolean = false;
  private inputEnded: boolean = false;
  private closed: boolean = false;

  private commandsProcessed: number = 0;
  private errorsReturned: number = 0;

  constructor(socket: Duplex, interpreter: ICommandInterpreter, config: ConnectionSessionConfig) {
    this.socket = socket;
    this.interpreter = interpreter;
    this.config = config;
  }

  public get id(): string {
    return this.config.id;
  }

  public start(): void {
    this.socket.on('data', (chunk: Buffer) => {
      this.handleData(chunk);
    });

    this.socket.on('end', () => {
      this.inputEnded = true;
      if (!this.processing) {
        this.socket.end();
      }
    });

    this.socket.on('close', () => {
      this.terminate();
    });

    this.socket.on('error', (err) => {
      console.error(`ConnectionSession: Socket error - ${this.config.id}: ${err.message}`);
      this.terminate();
    });
  }

  /**
   * Close the connection from the server side.
   */
  public close(): void {
    this.terminate();
    this.socket.destroy();
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public getStats(): SessionStats {
    return {
      id: this.config.id,
      commandsProcessed: this.commandsProcessed,
      errorsReturned: this.errorsReturned,
      closed: this.closed,
    };
  }

  private handleData(chunk: Buffer): void {
    if (this.closed) {
      return;
    }

    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    if (this.buffer.length > this.config.maxRequestBytes) {
      console.warn(`ConnectionSession: ${this.config.id} exceeded ${this.config.maxRequestBytes} buffered bytes, closing`);
      this.terminate();
      // Destroy once the reply is flushed; a half-open peer would otherwise keep the socket alive.
      this.socket.end(RESPProtocol.encodeReply(Replies.error('ERROR: request too large')), () => {
        this.socket.destroy();
      });
      return;
    }

    if (this.processing) {
      return;
    }

    this.processBuffer().catch((err) => {
      console.error(`ConnectionSession: ${this.config.id} failed: ${errorMessage(err)}`);
      this.close();
    });
  }

  private async processBuffer(): Promise<void> {
    this.processing = true;
    this.socket.pause();

    try {
      while (!this.closed) {
        const frame = this.nextFrame();
        if (frame === null) {
          break;
        }
        if ('protocolError' in frame) {
          await this.writeReply(frame.protocolError);
          continue;
        }
        if (frame.args.length === 0) {
          continue;
        }

        const reply = this.dispatch(frame.args);
        await this.writeReply(reply);
      }
    } finally {
      this.processing = false;
      if (!this.closed) {
        if (this.inputEnded) {
          this.socket.end();
        } else {
          this.socket.resume();
        }
      }
    }
  }

  private nextFrame(): Frame | null {
    let parsed: ParsedRequest | null;
    try {
      parsed = RESPProtocol.parseRequest(this.buffer);
    } catch (err) {
      if (!(err instanceof ProtocolError)) {
        throw err;
      }
      // The rest of the buffer can't be re-synchronised; drop it and keep the connection.
      this.buffer = Buffer.alloc(0);
      this.errorsReturned++;
      return { protocolError: Replies.error(err.message) };
    }

    if (parsed === null) {
      return null;
    }

    this.buffer = this.buffer.subarray(parsed.bytesConsumed);
    return { args: parsed.args };
  }

  private dispatch(request: readonly string[]): Reply {
    this.commandsProcessed++;

    let reply: Reply;
    try {
      reply = this.interpreter.execute(request);
    } catch (err) {
      console.error(`ConnectionSession: ${this.config.id} command '${request[0] ?? ''}' threw:`, err);
      reply = INTERNAL_ERROR;
    }

    if (reply.kind === 'error') {
      this.errorsReturned++;
    }
    return reply;
  }

  private async writeReply(reply: Reply): Promise<void> {
    if (this.socket.write(RESPProtocol.encodeReply(reply))) {
      return;
    }
    await this.waitForDrain();
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        this.socket.off('drain', done);
        this.socket.off('close', done);
        resolve();
      };
      this.socket.on('drain', done);
      this.socket.on('close', done);
    });
  }

  private terminate(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer = Buffer.alloc(0);
    this.config.onClose?.(this);
  }
}
