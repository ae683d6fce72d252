import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Duplex } from 'stream';
import { ConnectionSession } from '../../src/server/ConnectionSession';
import { CommandInterpreter, ICommandInterpreter } from '../../src/commands';
import { KeyspaceStore } from '../../src/storage/keyspace';

/**
 * In-memory socket: input is fed with push(), output is collected.
 */
class FakeSocket extends Duplex {
  readonly written: Buffer[] = [];

  override _read(): void {
    // input is pushed by the test
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk);
    callback();
  }

  output(): string {
    return Buffer.concat(this.written).toString('utf8');
  }
}

describe('ConnectionSession', () => {
  let store: KeyspaceStore;
  let socket: FakeSocket;
  let onClose: ReturnType<typeof vi.fn>;

  function startSession(
    interpreter: ICommandInterpreter = new CommandInterpreter(store),
    maxRequestBytes: number = 1024 * 1024,
  ): ConnectionSession {
    const session = new ConnectionSession(socket, interpreter, { id: 'test-1', maxRequestBytes, onClose });
    session.start();
    return session;
  }

  beforeEach(() => {
    store = new KeyspaceStore();
    socket = new FakeSocket();
    onClose = vi.fn();
  });

  it('answers pipelined commands in request order', async () => {
    const session = startSession();

    socket.push('SET a 1\r\nGET a\r\nDEL a\r\nGET a\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe('+OK\r\n$1\r\n1\r\n:1\r\n$-1\r\n');
    });
    expect(session.getStats()).toEqual({
      id: 'test-1',
      commandsProcessed: 4,
      errorsReturned: 0,
      closed: false,
    });
  });

  it('assembles a frame split across chunks', async () => {
    store.set('a', 'x');
    startSession();

    socket.push('*2\r\n$3\r\nGE');
    socket.push('T\r\n$1\r\na\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe('$1\r\nx\r\n');
    });
  });

  it('keeps the connection open after command errors', async () => {
    const session = startSession();

    socket.push('NOPE\r\nGET\r\nPING\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe(
        '-ERROR: unknown command\r\n-ERROR: wrong number of arguments\r\n+PONG\r\n',
      );
    });
    expect(session.isClosed()).toBe(false);
    expect(session.getStats().errorsReturned).toBe(2);
  });

  it('ignores blank lines', async () => {
    const session = startSession();

    socket.push('\r\n\r\nPING\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe('+PONG\r\n');
    });
    expect(session.getStats().commandsProcessed).toBe(1);
  });

  it('reports a protocol error, discards the buffer and continues', async () => {
    const session = startSession();

    socket.push('*1\r\n+bad\r\n');
    await vi.waitFor(() => {
      expect(socket.output()).toBe("-ERROR: protocol error: expected '$', got '+'\r\n");
    });

    socket.push('PING\r\n');
    await vi.waitFor(() => {
      expect(socket.output()).toBe("-ERROR: protocol error: expected '$', got '+'\r\n+PONG\r\n");
    });
    expect(session.isClosed()).toBe(false);
  });

  it('closes a connection that buffers more than maxRequestBytes', async () => {
    const session = startSession(undefined, 16);

    socket.push(`SET key ${'x'.repeat(20)}`);

    await vi.waitFor(() => {
      expect(socket.output()).toBe('-ERROR: request too large\r\n');
    });
    expect(session.isClosed()).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(store.size()).toBe(0);
    await vi.waitFor(() => {
      expect(socket.destroyed).toBe(true);
    });
  });

  it('replies to a protocol error before handling frames that follow it', async () => {
    startSession();

    socket.push('*1\r\n$x\r\n');
    socket.push('PING\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe("-ERROR: protocol error: invalid integer 'x'\r\n+PONG\r\n");
    });
  });

  it('turns an unexpected interpreter failure into an error reply', async () => {
    const failing: ICommandInterpreter = {
      execute() {
        throw new Error('boom');
      },
    };
    const session = startSession(failing);

    socket.push('GET a\r\n');

    await vi.waitFor(() => {
      expect(socket.output()).toBe('-ERROR: internal error\r\n');
    });
    expect(session.isClosed()).toBe(false);
  });

  it('terminates when the socket closes', async () => {
    const session = startSession();

    socket.destroy();

    await vi.waitFor(() => {
      expect(onClose).toHaveBeenCalledTimes(1);
    });
    expect(session.getStats().closed).toBe(true);
  });

  it('close() destroys the socket once', () => {
    const session = startSession();

    session.close();
    session.close();

    expect(socket.destroyed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
