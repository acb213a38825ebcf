import {
  describeError,
  FrameError,
  ProtocolError,
  RegistrationError,
  TransportError,
} from '../../shared/src/errors';
import { encodeMessage, FrameDecoder } from '../../shared/src/frameCodec';
import { cmdLog } from '../../shared/src/logger';
import {
  commandTagSchema,
  formatTarget,
  MAX_VIDEO_PORT,
  MIN_VIDEO_PORT,
  type Message,
  STATUS_REPORT_CMD,
  type VehicleMessage,
} from '../../shared/src/models';
import type { Actuator } from './actuator';
import type { ClientTargetRegistry, OwnerId } from './clientTargetRegistry';
import { PLACEHOLDER_BATTERY } from './config';
import { toMotionCommand } from './motionCommand';

/** The byte pipe under one session; a net.Socket in production. */
export interface SessionTransport {
  readonly peerAddress: string;
  readonly peerPort?: number;
  write(bytes: Buffer): Promise<void>;
  end(): void;
}

/** Collaborators shared by every session on the vehicle. */
export interface DispatchContext {
  registry: ClientTargetRegistry;
  actuator: Actuator;
  shutdown: { requestShutdown(reason: string): void };
  battery?: () => number;
}

export type SessionState = 'accepted' | 'reading' | 'dispatching' | 'closed';

/** Accepts a number or numeric string in 1..65535; anything else is null. */
export function parseVideoPort(value: unknown): number | null {
  const port = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isInteger(port) || port < MIN_VIDEO_PORT || port > MAX_VIDEO_PORT) {
    return null;
  }
  return port;
}

/**
 * One accepted command connection.
 *
 * Accepted → Reading → Dispatching → (Reading | Closed). Chunks are processed
 * strictly in arrival order; a reply is written before the next message is
 * dispatched.
 */
export class CommandSession {
  private state: SessionState = 'accepted';
  private readonly decoder = new FrameDecoder();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly id: OwnerId,
    private readonly transport: SessionTransport,
    private readonly ctx: DispatchContext
  ) {}

  get peer(): string {
    return this.transport.peerPort === undefined
      ? this.transport.peerAddress
      : `${this.transport.peerAddress}:${this.transport.peerPort}`;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /** Queue a chunk from the transport. Resolves once it has been fully dispatched. */
  receive(chunk: Buffer): Promise<void> {
    this.queue = this.queue
      .then(() => this.process(chunk))
      .catch((err: unknown) => {
        cmdLog.error(`Session ${this.id} (${this.peer}) failed`, describeError(err));
        this.transport.end();
        this.close('internal error');
      });
    return this.queue;
  }

  /** Close after every chunk already received has been dispatched. */
  drainAndClose(reason: string): Promise<void> {
    this.queue = this.queue.then(() => this.close(reason));
    return this.queue;
  }

  /** Enter Closed once; releases the media target if this session owns it. */
  close(reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.decoder.reset();
    cmdLog.info(`Session ${this.id} (${this.peer}) closed: ${reason}`);
    if (this.ctx.registry.releaseOwner(this.id)) {
      cmdLog.info(`Cleared video target registered by ${this.peer}`);
    }
  }

  private async process(chunk: Buffer): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'reading';
    for (const unit of this.decoder.push(chunk)) {
      if (this.isClosed) return;
      if (unit.kind === 'error') {
        this.reportFrameError(unit.error);
        continue;
      }
      this.state = 'dispatching';
      try {
        await this.dispatch(unit.message);
      } catch (err) {
        if (err instanceof TransportError) {
          cmdLog.warn(`Write to ${this.peer} failed: ${err.message}`);
          this.transport.end();
          this.close('write failed');
          return;
        }
        cmdLog.error(`Dispatch of "${unit.message.cmd}" from ${this.peer} failed`, describeError(err));
      }
      if (this.isClosed) return;
      this.state = 'reading';
    }
  }

  private async dispatch(message: Message): Promise<void> {
    const tag = commandTagSchema.safeParse(message.cmd);
    if (!tag.success) {
      this.reportProtocolError(new ProtocolError(message.cmd, `unknown command "${message.cmd}"`));
      return;
    }

    switch (tag.data) {
      case 'register_video':
        await this.registerVideo(message);
        break;

      case 'move': {
        const command = toMotionCommand(message);
        this.ctx.actuator.apply(command);
        cmdLog.debug(
          `move ${command.direction} speed=${command.speed.toFixed(2)} steering=${command.steering.toFixed(2)} from ${this.peer}`
        );
        break;
      }

      case 'stop':
        this.ctx.actuator.stop();
        cmdLog.debug(`stop from ${this.peer}`);
        break;

      case 'status': {
        const state = this.ctx.actuator.snapshot();
        await this.reply({
          cmd: STATUS_REPORT_CMD,
          battery: this.ctx.battery ? this.ctx.battery() : PLACEHOLDER_BATTERY,
          speed: state.speed,
          steering: state.steering,
        });
        break;
      }

      case 'quit':
        cmdLog.info(`Quit received from ${this.peer}`);
        this.ctx.shutdown.requestShutdown(`quit from ${this.peer}`);
        this.transport.end();
        this.close('quit');
        break;
    }
  }

  private async registerVideo(message: Message): Promise<void> {
    if (!('video_port' in message)) {
      this.reportProtocolError(new ProtocolError(message.cmd, 'register_video without video_port'));
      return;
    }
    const port = parseVideoPort(message.video_port);
    if (port === null) {
      const error = new RegistrationError(message.video_port);
      cmdLog.warn(`Rejected registration from ${this.peer}: ${error.message}`);
      await this.reply({ cmd: 'error', error: 'invalid_video_port', detail: error.message });
      return;
    }
    const target = { host: this.transport.peerAddress, port };
    this.ctx.registry.set(target, this.id);
    cmdLog.info(`Registered video target ${formatTarget(target)} for ${this.id}`);
  }

  private reply(message: VehicleMessage): Promise<void> {
    return this.transport.write(encodeMessage(message));
  }

  private reportFrameError(error: FrameError): void {
    cmdLog.warn(`Skipping malformed message from ${this.peer}: ${error.message} (${error.raw})`);
  }

  private reportProtocolError(error: ProtocolError): void {
    cmdLog.warn(`Ignoring message from ${this.peer}: ${error.message}`);
  }
}
