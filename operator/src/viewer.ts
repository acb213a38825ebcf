import http from 'http';
import cors from 'cors';
import express from 'express';
import { httpLog } from '../../shared/src/logger';
import type { ProbedFrame } from './imageProbe';
import type { FrameRenderer } from './mediaReceiver';

const BOUNDARY = 'roverframe';

const PAGE = `<!doctype html>
<html>
  <head><title>Rover camera</title></head>
  <body style="margin:0;background:#111;display:flex;justify-content:center">
    <img src="/stream.mjpg" alt="rover camera" style="image-rendering:pixelated;height:100vh">
  </body>
</html>
`;

/** No display available: frames are counted by the receiver and discarded. */
export class NullRenderer implements FrameRenderer {
  readonly name = 'no display';

  render(): void {}

  async close(): Promise<void> {}
}

/**
 * Serves the latest frame to browsers: a still at /frame.jpg and a
 * multipart/x-mixed-replace stream at /stream.mjpg.
 */
export class MjpegViewer implements FrameRenderer {
  readonly name = 'MJPEG viewer';
  private latest: ProbedFrame | null = null;
  private readonly viewers = new Set<express.Response>();
  private readonly server: http.Server;

  constructor(
    private readonly port: number,
    private readonly host = '127.0.0.1'
  ) {
    this.server = http.createServer(this.buildApp());
  }

  get viewerCount(): number {
    return this.viewers.size;
  }

  async listen(): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    const address = this.server.address();
    const port = address && typeof address !== 'string' ? address.port : this.port;
    httpLog.info(`Camera view on http://${this.host}:${port}/`);
    return port;
  }

  render(frame: ProbedFrame): void {
    this.latest = frame;
    for (const res of this.viewers) {
      writePart(res, frame.bytes);
    }
  }

  async close(): Promise<void> {
    for (const res of this.viewers) {
      res.end();
    }
    this.viewers.clear();
    if (!this.server.listening) return;
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
      this.server.closeAllConnections();
    });
  }

  private buildApp(): express.Express {
    const app = express();
    app.use(cors());

    app.get('/', (_req, res) => {
      res.type('html').send(PAGE);
    });

    app.get('/frame.jpg', (_req, res) => {
      if (!this.latest) {
        res.status(404).json({ error: 'no_frame' });
        return;
      }
      res.set('Cache-Control', 'no-store').type('jpeg').send(this.latest.bytes);
    });

    app.get('/stream.mjpg', (_req, res) => {
      res.writeHead(200, {
        'Content-Type': `multipart/x-mixed-replace; boundary=${BOUNDARY}`,
        'Cache-Control': 'no-store',
        Connection: 'close',
      });
      this.viewers.add(res);
      if (this.latest) writePart(res, this.latest.bytes);
      res.on('close', () => this.viewers.delete(res));
    });

    return app;
  }
}

function writePart(res: express.Response, jpeg: Buffer): void {
  res.write(`--${BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`);
  res.write(jpeg);
  res.write('\r\n');
}
