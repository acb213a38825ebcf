import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import type { VehicleState } from '../../shared/src/models';
import { deviceLog } from '../../shared/src/logger';
import { describeError } from '../../shared/src/errors';
import { DEVICE_HEARTBEAT_MS, DEVICE_MAX_PAYLOAD, DEVICE_WS_PATH } from './config';
import { BaseActuator } from './actuator';
import { sameMotion } from './motionCommand';
import {
  type DeviceInbound,
  deviceInboundSchema,
  type DeviceLinkStatus,
  type DeviceOutbound,
} from './models';

export interface DeviceLinkOptions {
  path?: string;
  heartbeatMs?: number;
}

/**
 * WebSocket link to the motor-driver board. The board connects to us on
 * `path`; one board at a time. While it is offline only the most recent drive
 * envelope is kept and it goes out right after the hello on reconnect.
 */
export class DeviceLink {
  private readonly wss: WebSocketServer;
  private readonly path: string;
  private readonly heartbeatMs: number;
  private board?: WebSocket;
  private alive = false;
  private heartbeatTimer?: NodeJS.Timeout;
  private pending?: DeviceOutbound;
  private lastHello?: string;
  private lastAckSeq: number | null = null;
  private seq = 0;

  constructor(server: http.Server, options: DeviceLinkOptions = {}) {
    this.path = options.path ?? DEVICE_WS_PATH;
    this.heartbeatMs = options.heartbeatMs ?? DEVICE_HEARTBEAT_MS;
    this.wss = new WebSocketServer({
      noServer: true,
      perMessageDeflate: false,
      maxPayload: DEVICE_MAX_PAYLOAD,
    });
    this.wss.on('connection', (socket, req) => this.handleConnection(socket, req));

    server.on('upgrade', (req, sock, head) => {
      const pathname = (req.url ?? '').split('?')[0];
      if (pathname !== this.path) {
        sock.destroy();
        return;
      }
      this.wss.handleUpgrade(req, sock, head, (ws) => {
        this.wss.emit('connection', ws, req);
      });
    });
  }

  sendDrive(state: VehicleState): void {
    this.seq += 1;
    const envelope: DeviceOutbound = {
      kind: 'drive',
      seq: this.seq,
      direction: state.direction,
      speed: state.speed,
      steering: state.steering,
    };
    if (this.isOnline()) {
      this.send(envelope);
      return;
    }
    this.pending = envelope;
    deviceLog.debug(`Board offline, holding drive seq=${envelope.seq}`);
  }

  status(): DeviceLinkStatus {
    return {
      connected: this.isOnline(),
      lastHello: this.lastHello,
      lastAckSeq: this.lastAckSeq,
      pending: this.pending !== undefined,
    };
  }

  close(): Promise<void> {
    this.stopHeartbeat();
    if (this.board) {
      this.board.terminate();
      this.board = undefined;
    }
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private isOnline(): boolean {
    return this.board !== undefined && this.board.readyState === WebSocket.OPEN;
  }

  private handleConnection(socket: WebSocket, req: http.IncomingMessage): void {
    const remote = req.socket.remoteAddress ?? 'unknown';
    if (this.isOnline()) {
      deviceLog.warn('Rejecting additional board connection from', remote);
      socket.close(1000, 'Only one motor board supported');
      return;
    }

    this.board = socket;
    this.alive = true;
    req.socket.setNoDelay(true);
    deviceLog.info('Motor board connected from', remote);

    socket.on('pong', () => {
      this.alive = true;
    });
    socket.on('message', (data) => this.handleMessage(data));
    socket.on('close', (code, reason) => this.handleClose(socket, code, reason.toString()));
    socket.on('error', (err) => deviceLog.warn('Board socket error', err.message));

    this.startHeartbeat();
    this.send({ kind: 'hello', serverTime: Date.now() });
    if (this.pending) {
      const held = this.pending;
      this.pending = undefined;
      this.send(held);
    }
  }

  private handleMessage(data: WebSocket.RawData): void {
    let payload: unknown;
    try {
      payload = JSON.parse(data.toString());
    } catch (err) {
      deviceLog.warn('Unparsable board message', describeError(err));
      return;
    }
    const parsed = deviceInboundSchema.safeParse(payload);
    if (!parsed.success) {
      deviceLog.warn('Unknown board message', payload);
      return;
    }
    this.routeInbound(parsed.data);
  }

  private routeInbound(message: DeviceInbound): void {
    switch (message.kind) {
      case 'hello':
        this.lastHello = new Date().toISOString();
        deviceLog.info(`Board hello id=${message.boardId} fw=${message.fw}`);
        break;
      case 'ack':
        this.lastAckSeq = message.seq;
        break;
      case 'error':
        deviceLog.error(`Board error seq=${message.seq ?? 'n/a'} message=${message.message}`);
        break;
      case 'pong':
        this.alive = true;
        break;
    }
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    if (socket !== this.board) return;
    deviceLog.info(`Motor board disconnected code=${code} reason=${reason}`);
    this.stopHeartbeat();
    this.board = undefined;
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const board = this.board;
      if (!board || board.readyState !== WebSocket.OPEN) return;
      if (!this.alive) {
        deviceLog.warn('No pong from motor board; terminating socket');
        board.terminate();
        return;
      }
      this.alive = false;
      board.ping();
    }, this.heartbeatMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private send(envelope: DeviceOutbound): void {
    const board = this.board;
    if (!board || board.readyState !== WebSocket.OPEN) return;
    board.send(JSON.stringify(envelope), (err) => {
      if (err) deviceLog.warn(`Failed to send ${envelope.kind} to board`, err.message);
    });
  }
}

/**
 * Hardware-backed actuator: forwards each distinct motion state to the motor
 * board, which owns PWM duty translation.
 */
export class DeviceLinkActuator extends BaseActuator {
  readonly kind = 'device';
  private lastSent?: VehicleState;

  constructor(private readonly link: Pick<DeviceLink, 'sendDrive'>) {
    super();
  }

  protected drive(state: VehicleState): void {
    if (this.lastSent && sameMotion(this.lastSent, state)) {
      return;
    }
    this.lastSent = state;
    this.link.sendDrive(state);
  }
}
