import net from 'net';
import { EventEmitter } from 'events';
import { describeError, TransportError } from '../../shared/src/errors';
import { encodeMessage, FrameDecoder } from '../../shared/src/frameCodec';
import { operatorLog } from '../../shared/src/logger';
import { type OperatorMessage, type StatusReport, statusReportSchema } from '../../shared/src/models';
import { WriteGate } from './writeGate';

export interface OperatorLinkOptions {
  host: string;
  port: number;
  connectTimeoutMs?: number;
}

/** Anything that can put a command on the wire. */
export interface CommandLink {
  send(message: OperatorMessage): Promise<void>;
}

/**
 * The operator's one TCP connection to the vehicle. Every writer goes through
 * the same WriteGate, so a move, a status poll and the final quit never
 * interleave on the socket. Incoming bytes are decoded as status replies.
 */
export class OperatorLink implements CommandLink {
  private socket?: net.Socket;
  private readonly gate = new WriteGate();
  private readonly decoder = new FrameDecoder();
  private readonly events = new EventEmitter();
  private closed = false;

  constructor(private readonly options: OperatorLinkOptions) {}

  connect(): Promise<void> {
    const { host, port, connectTimeoutMs = 5000 } = this.options;
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      socket.setTimeout(connectTimeoutMs);
      const fail = (err: Error): void => {
        socket.destroy();
        reject(new TransportError(`cannot reach vehicle at ${host}:${port}: ${err.message}`, { cause: err }));
      };
      socket.once('error', fail);
      socket.once('timeout', () => fail(new Error('connect timed out')));
      socket.once('connect', () => {
        socket.off('error', fail);
        socket.setTimeout(0);
        socket.setNoDelay(true);
        this.attach(socket);
        operatorLog.info(`Connected to vehicle ${host}:${port}`);
        resolve();
      });
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.socket !== undefined && !this.socket.destroyed;
  }

  send(message: OperatorMessage): Promise<void> {
    const bytes = encodeMessage(message);
    return this.gate.run(() => this.write(bytes));
  }

  onStatus(listener: (report: StatusReport) => void): () => void {
    this.events.on('status', listener);
    return () => this.events.off('status', listener);
  }

  /** Non-status replies, e.g. `{cmd: "error"}` for a rejected registration. */
  onReply(listener: (reply: Record<string, unknown>) => void): () => void {
    this.events.on('reply', listener);
    return () => this.events.off('reply', listener);
  }

  onClosed(listener: () => void): () => void {
    this.events.on('closed', listener);
    return () => this.events.off('closed', listener);
  }

  /** Let queued writes finish, then half-close and drop the socket. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.gate.idle();
    const socket = this.socket;
    if (!socket || socket.destroyed) return;
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    socket.on('error', (err) => {
      operatorLog.warn('Vehicle link error', describeError(err));
    });
    socket.on('close', () => {
      if (!this.closed) {
        operatorLog.warn('Vehicle closed the command connection');
      }
      this.closed = true;
      this.events.emit('closed');
    });
  }

  private handleData(chunk: Buffer): void {
    for (const unit of this.decoder.push(chunk)) {
      // Older vehicles send the status object without a cmd tag.
      let payload: unknown;
      if (unit.kind === 'message') {
        payload = unit.message;
      } else if (unit.error.value !== undefined) {
        payload = unit.error.value;
      } else {
        operatorLog.warn('Dropped unreadable reply', unit.error.raw);
        continue;
      }
      const report = statusReportSchema.safeParse(payload);
      if (report.success) {
        this.events.emit('status', report.data);
      } else if (unit.kind === 'message') {
        this.events.emit('reply', unit.message);
      } else {
        operatorLog.warn('Dropped unexpected reply', unit.error.raw);
      }
    }
  }

  private write(bytes: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed || !socket.writable) {
      return Promise.reject(new TransportError('vehicle link is not connected'));
    }
    return new Promise((resolve, reject) => {
      socket.write(bytes, (err) => {
        if (err) {
          reject(new TransportError(`write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}
