import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { ResourceUnavailableError } from '../../shared/src/errors';
import { mediaLog } from '../../shared/src/logger';
import { FRAME_HEIGHT, FRAME_WIDTH } from './config';

/** Uncompressed interleaved pixels as they come off the capture device. */
export interface RawFrame {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Buffer;
}

/**
 * Camera capture collaborator. `open` throws ResourceUnavailableError when the
 * device cannot be used; `read` returns null when no frame could be acquired,
 * and returns early with null once `signal` aborts.
 */
export interface FrameSource {
  readonly name: string;
  open(): Promise<void>;
  read(signal?: AbortSignal): Promise<RawFrame | null>;
  release(): Promise<void>;
}

/** Moving colour gradient; stands in for a camera on a bench or in CI. */
export class TestPatternSource implements FrameSource {
  readonly name = 'pattern';
  private tick = 0;
  private opened = false;

  constructor(
    private readonly width = FRAME_WIDTH,
    private readonly height = FRAME_HEIGHT
  ) {}

  async open(): Promise<void> {
    this.opened = true;
  }

  async read(): Promise<RawFrame | null> {
    if (!this.opened) return null;
    const { width, height } = this;
    const data = Buffer.alloc(width * height * 3);
    const shift = (this.tick++ * 4) % 256;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = (y * width + x) * 3;
        data[i] = (x + shift) % 256;
        data[i + 1] = (y * 2) % 256;
        data[i + 2] = (255 - shift + x) % 256;
      }
    }
    return { width, height, channels: 3, data };
  }

  async release(): Promise<void> {
    this.opened = false;
  }
}

/** Capture disabled by configuration. */
export class NullFrameSource implements FrameSource {
  readonly name = 'none';

  async open(): Promise<void> {
    throw new ResourceUnavailableError('camera', 'capture disabled by configuration');
  }

  async read(): Promise<RawFrame | null> {
    return null;
  }

  async release(): Promise<void> {
    return;
  }
}

const FRAME_WAIT_MS = 1000;

/**
 * V4L2 camera read through an `ffmpeg` child process emitting raw rgb24 frames
 * already scaled to the output size. Only the newest complete frame is kept.
 */
export class FfmpegCaptureSource implements FrameSource {
  readonly name = 'ffmpeg';
  private child?: ChildProcessByStdio<null, Readable, Readable>;
  private buffer: Buffer = Buffer.alloc(0);
  private latest?: Buffer;
  private exited = false;
  private waiter?: () => void;
  private stderrTail = '';

  constructor(
    private readonly device: string,
    private readonly width = FRAME_WIDTH,
    private readonly height = FRAME_HEIGHT,
    private readonly command = 'ffmpeg'
  ) {}

  private get frameBytes(): number {
    return this.width * this.height * 3;
  }

  open(): Promise<void> {
    const args = [
      '-loglevel', 'error',
      '-f', 'v4l2',
      '-i', this.device,
      '-vf', `scale=${this.width}:${this.height}`,
      '-pix_fmt', 'rgb24',
      '-f', 'rawvideo',
      'pipe:1',
    ];
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      child.once('error', (err) => {
        if (this.child === child) {
          mediaLog.warn(`ffmpeg error: ${err.message}`);
          return;
        }
        reject(new ResourceUnavailableError('camera', `cannot start ${this.command}: ${err.message}`, { cause: err }));
      });
      child.once('spawn', () => {
        this.child = child;
        this.exited = false;
        child.stdout.on('data', (chunk: Buffer) => this.handleData(chunk));
        child.stderr.on('data', (chunk: Buffer) => {
          this.stderrTail = (this.stderrTail + chunk.toString('utf8')).slice(-500);
        });
        child.once('exit', (code, signal) => {
          this.exited = true;
          if (code !== 0 && signal === null) {
            mediaLog.warn(`ffmpeg exited with code ${code}: ${this.stderrTail.trim()}`);
          }
          this.wake();
        });
        mediaLog.info(`Capturing ${this.device} through ffmpeg (pid ${child.pid ?? '?'})`);
        resolve();
      });
    });
  }

  async read(signal?: AbortSignal): Promise<RawFrame | null> {
    if (!this.latest && !this.exited && this.child && !signal?.aborted) {
      await new Promise<void>((resolve) => {
        const finish = (): void => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', finish);
          this.waiter = undefined;
          resolve();
        };
        const timer = setTimeout(finish, FRAME_WAIT_MS);
        signal?.addEventListener('abort', finish, { once: true });
        this.waiter = finish;
      });
    }
    const data = this.latest;
    this.latest = undefined;
    if (!data) return null;
    return { width: this.width, height: this.height, channels: 3, data };
  }

  async release(): Promise<void> {
    const child = this.child;
    this.child = undefined;
    this.wake();
    if (!child || this.exited) return;
    await new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
      child.kill('SIGTERM');
    });
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const size = this.frameBytes;
    while (this.buffer.length >= size) {
      this.latest = Buffer.from(this.buffer.subarray(0, size));
      this.buffer = this.buffer.subarray(size);
    }
    if (this.latest) this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}
