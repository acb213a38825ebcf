import dgram from 'dgram';
import { TransportError } from '../../shared/src/errors';
import { mediaLog } from '../../shared/src/logger';
import { formatTarget, type VideoTarget } from '../../shared/src/models';

/** Delivers one encoded frame as one datagram. */
export interface MediaSink {
  send(bytes: Buffer, target: VideoTarget): Promise<void>;
  close(): Promise<void>;
}

export class UdpMediaSink implements MediaSink {
  private readonly socket = dgram.createSocket('udp4');
  private closed = false;

  constructor() {
    this.socket.on('error', (err) => mediaLog.warn('UDP socket error', err.message));
  }

  send(bytes: Buffer, target: VideoTarget): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('media socket closed'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(bytes, target.port, target.host, (err) => {
        if (err) {
          reject(new TransportError(`send to ${formatTarget(target)} failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve) => this.socket.close(() => resolve()));
  }
}
