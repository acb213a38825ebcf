import { describeError } from '../../shared/src/errors';
import { operatorLog } from '../../shared/src/logger';
import type { MotionCommand, OperatorMessage } from '../../shared/src/models';
import type { ControlSource } from './controlSource';
import { CHANGE_THRESHOLD, CONTROL_TICK_MS, SEND_INTERVAL_MS, STATUS_INTERVAL_MS } from './config';
import type { CommandLink } from './operatorLink';

export interface CommandSenderOptions {
  tickMs?: number;
  sendIntervalMs?: number;
  /** 0 disables status polling. */
  statusIntervalMs?: number;
  clock?: () => number;
}

export function toOperatorMessage(command: MotionCommand): OperatorMessage {
  if (command.direction === 'stop') {
    return { cmd: 'stop' };
  }
  return { cmd: 'move', direction: command.direction, speed: command.speed, steering: command.steering };
}

/**
 * True when `next` is worth a datagram on its own: a direction flip or a jump
 * of more than CHANGE_THRESHOLD on either axis.
 */
export function significantChange(previous: MotionCommand | null, next: MotionCommand): boolean {
  if (!previous) return true;
  return (
    previous.direction !== next.direction ||
    Math.abs(previous.speed - next.speed) > CHANGE_THRESHOLD ||
    Math.abs(previous.steering - next.steering) > CHANGE_THRESHOLD
  );
}

/**
 * Polls a ControlSource and forwards its intent to the vehicle. Small wobbles
 * are folded into the periodic refresh so the link carries at most one move
 * per tick and at least one per send interval.
 */
export class CommandSender {
  private timer?: NodeJS.Timeout;
  private lastSent: MotionCommand | null = null;
  private lastSentAt = Number.NEGATIVE_INFINITY;
  private lastStatusAt = Number.NEGATIVE_INFINITY;
  private inFlight = false;
  private sent = 0;
  private failures = 0;
  private readonly tickMs: number;
  private readonly sendIntervalMs: number;
  private readonly statusIntervalMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly link: CommandLink,
    private readonly source: ControlSource,
    options: CommandSenderOptions = {}
  ) {
    this.tickMs = options.tickMs ?? CONTROL_TICK_MS;
    this.sendIntervalMs = options.sendIntervalMs ?? SEND_INTERVAL_MS;
    this.statusIntervalMs = options.statusIntervalMs ?? STATUS_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  stats(): { sent: number; failures: number } {
    return { sent: this.sent, failures: this.failures };
  }

  start(): void {
    if (this.timer) return;
    operatorLog.info(`Sending ${this.source.name} input every ${this.tickMs}ms`);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
  }

  /** One poll of the control source. Skipped while the previous send is still on the wire. */
  async tick(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      const now = this.clock();
      const command = this.source.read(now);
      if (significantChange(this.lastSent, command) || now - this.lastSentAt >= this.sendIntervalMs) {
        this.lastSent = command;
        this.lastSentAt = now;
        await this.deliver(toOperatorMessage(command));
      }
      if (this.statusIntervalMs > 0 && now - this.lastStatusAt >= this.statusIntervalMs) {
        this.lastStatusAt = now;
        await this.deliver({ cmd: 'status' });
      }
    } finally {
      this.inFlight = false;
    }
  }

  /** Stop polling and, unless the link is already gone, leave the vehicle with a final stop. */
  async stop(sendFinalStop = true): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (sendFinalStop) {
      await this.deliver({ cmd: 'stop' });
    }
    this.lastSent = null;
  }

  private async deliver(message: OperatorMessage): Promise<void> {
    try {
      await this.link.send(message);
      this.sent += 1;
    } catch (err) {
      this.failures += 1;
      operatorLog.warn(`Failed to send ${message.cmd}`, describeError(err));
    }
  }
}
