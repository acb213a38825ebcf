import net from 'net';
import { describeError, ListenerClosedError, TransportError } from '../../shared/src/errors';
import { cmdLog } from '../../shared/src/logger';
import { CommandSession, type DispatchContext, type SessionTransport } from './commandSession';

export interface CommandChannelOptions {
  host: string;
  port: number;
  /** Cancellation token; aborting it stops the accept loop. */
  signal: AbortSignal;
  /** Grace period for open connections before they are destroyed on close. */
  drainMs?: number;
}

interface OpenConnection {
  session: CommandSession;
  socket: net.Socket;
}

/** IPv4 peers on a dual-stack listener show up as ::ffff:a.b.c.d. */
export function normalizeAddress(address: string | undefined): string {
  if (!address) return 'unknown';
  return address.startsWith('::ffff:') && address.includes('.') ? address.slice(7) : address;
}

/**
 * A listener fault after we asked the listener to close is expected; anything
 * else is a genuine transport problem.
 */
export function classifyListenerError(err: Error, signal: AbortSignal): ListenerClosedError | TransportError {
  const code = 'code' in err ? err.code : undefined;
  if (signal.aborted || code === 'ERR_SERVER_NOT_RUNNING') {
    return new ListenerClosedError({ cause: err });
  }
  return new TransportError(`listener error: ${err.message}`, { cause: err });
}

/** The readable half of a connection, as `readChunks` drives it. */
export interface ChunkSource {
  readonly destroyed: boolean;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  pause(): unknown;
  resume(): unknown;
}

/**
 * Feed a session one chunk at a time. The source stays paused until the chunk
 * has been dispatched, so a peer that never reads its replies stops being read.
 */
export function readChunks(source: ChunkSource, session: Pick<CommandSession, 'receive'>): void {
  source.on('data', (chunk: Buffer) => {
    source.pause();
    void session.receive(chunk).then(() => {
      if (!source.destroyed) source.resume();
    });
  });
}

/**
 * Reliable, ordered command transport. Each accepted socket gets its own
 * CommandSession; sessions share nothing but the dispatch context.
 */
export class CommandChannel {
  private server?: net.Server;
  private readonly connections = new Map<string, OpenConnection>();
  private nextId = 0;
  private closed?: Promise<void>;
  private resolveClosed: () => void = () => undefined;

  constructor(
    private readonly ctx: DispatchContext,
    private readonly options: CommandChannelOptions
  ) {}

  /** Bind and start accepting. Resolves with the bound address. */
  listen(): Promise<net.AddressInfo> {
    if (this.server) {
      return Promise.reject(new TransportError('command channel already listening'));
    }
    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
    server.on('close', () => {
      cmdLog.info('Command listener closed');
      this.resolveClosed();
    });

    return new Promise((resolve, reject) => {
      const onStartupError = (err: Error): void => {
        reject(new TransportError(`cannot listen on ${this.options.host}:${this.options.port}: ${err.message}`, { cause: err }));
      };
      server.once('error', onStartupError);
      server.listen({ host: this.options.host, port: this.options.port, signal: this.options.signal }, () => {
        server.off('error', onStartupError);
        server.on('error', (err) => this.handleListenerError(err));
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new TransportError(`unexpected listener address ${String(address)}`));
          return;
        }
        cmdLog.info(`Listening for control connections on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== 'string' ? address : null;
  }

  sessionCount(): number {
    return this.connections.size;
  }

  /** Resolves when the listener has closed (never, if it never listened). */
  done(): Promise<void> {
    return this.closed ?? Promise.resolve();
  }

  /**
   * Stop accepting and wind down open connections: each gets a FIN and, after
   * `drainMs`, is destroyed if the peer has not closed its side.
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    server.close((err) => {
      if (err) this.handleListenerError(err);
    });
    const drainMs = this.options.drainMs ?? 250;
    for (const { session, socket } of this.connections.values()) {
      session.close('listener shutting down');
      socket.end();
      setTimeout(() => socket.destroy(), drainMs).unref();
    }
    return this.done();
  }

  private handleListenerError(err: Error): void {
    const classified = classifyListenerError(err, this.options.signal);
    if (classified instanceof ListenerClosedError) {
      cmdLog.debug('Listener closed by shutdown', err.message);
      return;
    }
    cmdLog.error(classified.message);
  }

  private handleConnection(socket: net.Socket): void {
    if (this.options.signal.aborted) {
      socket.destroy();
      return;
    }

    const id = `conn-${++this.nextId}`;
    socket.setNoDelay(true);
    const transport: SessionTransport = {
      peerAddress: normalizeAddress(socket.remoteAddress),
      peerPort: socket.remotePort,
      write: (bytes) =>
        new Promise<void>((resolve, reject) => {
          if (socket.destroyed || !socket.writable) {
            reject(new TransportError('socket is not writable'));
            return;
          }
          socket.write(bytes, (err) => {
            if (err) reject(new TransportError(err.message, { cause: err }));
            else resolve();
          });
        }),
      end: () => {
        socket.end();
      },
    };
    const session = new CommandSession(id, transport, this.ctx);
    this.connections.set(id, { session, socket });
    cmdLog.info(`Accepted ${session.peer} as ${id}`);

    readChunks(socket, session);
    socket.on('end', () => {
      void session.drainAndClose('peer disconnected').then(() => socket.end());
    });
    socket.on('error', (err) => {
      cmdLog.warn(`Connection ${id} error: ${describeError(err)}`);
      session.close('read error');
    });
    socket.on('close', () => {
      this.connections.delete(id);
      void session.drainAndClose('connection closed');
    });
  }
}
