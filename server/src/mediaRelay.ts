import { describeError } from '../../shared/src/errors';
import { mediaLog } from '../../shared/src/logger';
import { formatTarget, type VideoTarget } from '../../shared/src/models';
import { sleep } from '../../shared/src/sleep';
import type { RawFrame, FrameSource } from './capture';
import type { ClientTargetRegistry } from './clientTargetRegistry';
import { NO_TARGET_BACKOFF_MS } from './config';
import type { FrameEncoder } from './frameEncoder';
import type { MediaSink } from './mediaSink';
import type { RelayStats } from './models';

export interface MediaRelayOptions {
  frameRate: number;
  noTargetBackoffMs?: number;
}

/**
 * Long-lived loop moving frames from the capture source to whatever target
 * the registry currently holds. Strictly best-effort: a failed capture,
 * encode or send costs one iteration and nothing else.
 */
export class MediaRelay {
  private readonly abort = new AbortController();
  private readonly intervalMs: number;
  private readonly backoffMs: number;
  private stopping = false;
  private loop?: Promise<void>;
  private sendFailing = false;
  private readonly counters: RelayStats = {
    running: false,
    framesSent: 0,
    sendFailures: 0,
    encodeFailures: 0,
    captureFailures: 0,
    lastSendAt: null,
  };

  constructor(
    private readonly registry: ClientTargetRegistry,
    private readonly source: FrameSource,
    private readonly encoder: FrameEncoder,
    private readonly sink: MediaSink,
    options: MediaRelayOptions
  ) {
    this.intervalMs = 1000 / options.frameRate;
    this.backoffMs = options.noTargetBackoffMs ?? NO_TARGET_BACKOFF_MS;
  }

  /** Start the loop once; later calls return the same completion promise. */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  /** Resolves when the loop has exited and the source is released. */
  done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /** The loop exits at its next check, at most one iteration from now. */
  stop(): void {
    this.stopping = true;
    this.abort.abort();
  }

  stats(): RelayStats {
    return { ...this.counters };
  }

  private async run(): Promise<void> {
    try {
      await this.source.open();
    } catch (err) {
      mediaLog.warn(`Capture source "${this.source.name}" unavailable, streaming disabled: ${describeError(err)}`);
      return;
    }

    mediaLog.info(`Relay started (source=${this.source.name}, interval=${this.intervalMs.toFixed(1)}ms)`);
    this.counters.running = true;
    try {
      while (!this.stopping) {
        const target = this.registry.get();
        if (!target) {
          await sleep(this.backoffMs, this.abort.signal);
          continue;
        }
        const startedAt = Date.now();
        await this.relayOnce(target);
        const elapsed = Date.now() - startedAt;
        await sleep(Math.max(0, this.intervalMs - elapsed), this.abort.signal);
      }
    } finally {
      this.counters.running = false;
      await this.releaseSource();
      mediaLog.info('Relay stopped');
    }
  }

  private async relayOnce(target: VideoTarget): Promise<void> {
    let frame: RawFrame | null;
    try {
      frame = await this.source.read(this.abort.signal);
    } catch (err) {
      this.counters.captureFailures++;
      mediaLog.debug('Frame capture failed', describeError(err));
      return;
    }
    if (!frame) {
      this.counters.captureFailures++;
      return;
    }

    let encoded: Buffer;
    try {
      encoded = await this.encoder.encode(frame);
    } catch (err) {
      this.counters.encodeFailures++;
      mediaLog.debug('Frame encode failed', describeError(err));
      return;
    }

    try {
      await this.sink.send(encoded, target);
    } catch (err) {
      this.counters.sendFailures++;
      if (!this.sendFailing) {
        this.sendFailing = true;
        mediaLog.warn(`Sending to ${formatTarget(target)} failing: ${describeError(err)}`);
      } else {
        mediaLog.debug('Send failed again', describeError(err));
      }
      return;
    }

    if (this.sendFailing) {
      this.sendFailing = false;
      mediaLog.info(`Sending to ${formatTarget(target)} recovered`);
    }
    this.counters.framesSent++;
    this.counters.lastSendAt = Date.now();
  }

  private async releaseSource(): Promise<void> {
    try {
      await this.source.release();
    } catch (err) {
      mediaLog.warn('Failed to release capture source', describeError(err));
    }
  }
}
