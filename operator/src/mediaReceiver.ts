import dgram from 'dgram';
import { describeError, ResourceUnavailableError } from '../../shared/src/errors';
import { mediaLog } from '../../shared/src/logger';
import type { ImageProbe, ProbedFrame } from './imageProbe';

export interface FrameRenderer {
  readonly name: string;
  render(frame: ProbedFrame): void;
  close(): Promise<void>;
}

export interface MediaReceiverStats {
  received: number;
  rendered: number;
  dropped: number;
  stale: number;
}

export interface MediaReceiverOptions {
  host?: string;
  port: number;
  clock?: () => number;
}

/**
 * Binds the video port and shows whatever arrives. Every datagram stands
 * alone: an undecodable one is dropped and counted, and a frame that finishes
 * probing after a newer one has been shown is discarded as stale.
 */
export class MediaReceiver {
  private readonly socket = dgram.createSocket('udp4');
  private readonly closed: Promise<void>;
  private readonly counters: MediaReceiverStats = { received: 0, rendered: 0, dropped: 0, stale: 0 };
  private nextSeq = 0;
  private lastRenderedSeq = -1;
  private stopped = false;
  private readonly clock: () => number;

  constructor(
    private readonly probe: ImageProbe,
    private readonly renderer: FrameRenderer,
    private readonly options: MediaReceiverOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.closed = new Promise((resolve) => this.socket.once('close', () => resolve()));
    this.socket.on('message', (bytes) => {
      void this.handleDatagram(bytes);
    });
  }

  /** Bind the UDP port. Resolves with the bound port. */
  start(): Promise<number> {
    const { host = '0.0.0.0', port } = this.options;
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new ResourceUnavailableError('video-port', `cannot bind UDP ${host}:${port}: ${err.message}`, { cause: err }));
      };
      this.socket.once('error', onError);
      this.socket.bind(port, host, () => {
        this.socket.off('error', onError);
        this.socket.on('error', (err) => mediaLog.warn('Video socket error', err.message));
        const bound = this.socket.address().port;
        mediaLog.info(`Receiving video on UDP ${host}:${bound}, rendering to ${this.renderer.name}`);
        resolve(bound);
      });
    });
  }

  stats(): MediaReceiverStats {
    return { ...this.counters };
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.socket.close();
  }

  done(): Promise<void> {
    return this.closed;
  }

  private async handleDatagram(bytes: Buffer): Promise<void> {
    const seq = this.nextSeq++;
    this.counters.received += 1;
    const receivedAt = this.clock();
    const probed = await this.probe.probe(bytes);
    if (this.stopped) return;
    if (!probed) {
      this.counters.dropped += 1;
      mediaLog.debug(`Dropped undecodable datagram (${bytes.length} bytes)`);
      return;
    }
    if (seq < this.lastRenderedSeq) {
      this.counters.stale += 1;
      return;
    }
    this.lastRenderedSeq = seq;
    try {
      this.renderer.render({ ...probed, receivedAt });
      this.counters.rendered += 1;
    } catch (err) {
      mediaLog.warn(`${this.renderer.name} failed to render a frame`, describeError(err));
    }
  }
}
