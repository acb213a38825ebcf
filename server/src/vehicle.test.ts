import net from 'net';
import { describe, expect, it, vi } from 'vitest';
import { ResourceUnavailableError } from '../../shared/src/errors';
import type { VideoTarget } from '../../shared/src/models';
import type { FrameEncoder } from './frameEncoder';
import type { MediaSink } from './mediaSink';
import { CommandSession, type SessionTransport } from './commandSession';
import { loadVehicleConfig } from './config';
import { createFrameSource, Vehicle } from './vehicle';

class RecordingSink implements MediaSink {
  readonly targets: VideoTarget[] = [];
  closed = false;

  async send(_bytes: Buffer, target: VideoTarget): Promise<void> {
    this.targets.push(target);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const tinyEncoder: FrameEncoder = {
  encode: async () => Buffer.from([0xff, 0xd8, 0xff, 0xd9]),
};

function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => resolve(socket));
    socket.once('error', reject);
  });
}

function lines(socket: net.Socket): string[] {
  const received: string[] = [];
  let pending = '';
  socket.on('data', (chunk: Buffer) => {
    pending += chunk.toString('utf8');
    let end = pending.indexOf('\n');
    while (end >= 0) {
      received.push(pending.slice(0, end));
      pending = pending.slice(end + 1);
      end = pending.indexOf('\n');
    }
  });
  return received;
}

/** Holds a loopback port so a second bind to it fails. */
function occupyPort(): Promise<{ port: number; release(): Promise<void> }> {
  const server = net.createServer();
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address && typeof address !== 'string' ? address.port : 0;
      resolve({ port, release: () => new Promise<void>((done) => server.close(() => done())) });
    });
  });
}

function testConfig() {
  return loadVehicleConfig(['--host', '127.0.0.1', '--port', '0', '--http-port', '0', '--fps', '50'], {});
}

describe('Vehicle end to end', () => {
  it('relays, dispatches, reports and quits', async () => {
    const sink = new RecordingSink();
    const vehicle = new Vehicle(testConfig(), { sink, encoder: tinyEncoder });
    const { commandPort, httpPort } = await vehicle.start();
    expect(httpPort).toBeNull();

    const socket = await connect(commandPort);
    const received = lines(socket);
    socket.write('{"cmd":"register_video","video_port":6000}\n');
    await vi.waitFor(() => expect(sink.targets.length).toBeGreaterThan(0));
    expect(sink.targets[0]).toEqual({ host: '127.0.0.1', port: 6000 });

    socket.write('{"cmd":"move","direction":"forward","speed":1.5,"steering":-3}\n{"cmd":"status"}\n');
    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(JSON.parse(received[0])).toEqual({ cmd: 'status_report', battery: 100, speed: 1, steering: -1 });

    const exited = vehicle.waitForExit(1000);
    socket.write('{"cmd":"quit"}\n');
    const started = Date.now();
    const outcomes = await exited;
    expect(Date.now() - started).toBeLessThan(2000);
    expect(outcomes).toEqual([
      { name: 'command-channel', outcome: 'stopped' },
      { name: 'media-relay', outcome: 'stopped' },
    ]);
    expect(vehicle.relay.stats().running).toBe(false);
    expect(sink.closed).toBe(true);
    expect(vehicle.actuator.snapshot()).toEqual({ direction: 'stop', speed: 0, steering: 0 });
    await expect(connect(commandPort)).rejects.toThrow();
    socket.destroy();
  });

  it('streams to the registering peer address', async () => {
    const sink = new RecordingSink();
    const vehicle = new Vehicle(testConfig(), { sink, encoder: tinyEncoder });
    await vehicle.start();

    const transport: SessionTransport = {
      peerAddress: '10.0.0.5',
      peerPort: 51000,
      write: async () => undefined,
      end: () => undefined,
    };
    const session = new CommandSession('remote-1', transport, vehicle.dispatchContext);
    await session.receive(Buffer.from('{"cmd":"register_video","video_port":6000}\n'));
    await vi.waitFor(() => expect(sink.targets.length).toBeGreaterThan(0));
    expect(sink.targets[0]).toEqual({ host: '10.0.0.5', port: 6000 });

    session.close('peer disconnected');
    expect(vehicle.registry.get()).toBeNull();

    const exited = vehicle.waitForExit(1000);
    vehicle.coordinator.requestShutdown('test finished');
    await exited;
  });
});

describe('Vehicle without its diagnostics port', () => {
  it('keeps commanding and streaming when the HTTP port is taken', async () => {
    const busy = await occupyPort();
    const sink = new RecordingSink();
    const vehicle = new Vehicle({ ...testConfig(), httpPort: busy.port }, { sink, encoder: tinyEncoder });
    const { commandPort, httpPort } = await vehicle.start();
    expect(httpPort).toBeNull();

    const socket = await connect(commandPort);
    const received = lines(socket);
    socket.write('{"cmd":"register_video","video_port":6000}\n{"cmd":"status"}\n');
    await vi.waitFor(() => expect(received).toHaveLength(1));
    await vi.waitFor(() => expect(sink.targets.length).toBeGreaterThan(0));

    const exited = vehicle.waitForExit(1000);
    vehicle.coordinator.requestShutdown('test finished');
    expect((await exited).map((o) => o.name)).toEqual(['command-channel', 'media-relay']);
    socket.destroy();
    await busy.release();
  });

  it('refuses to run the motor board link without its HTTP server', async () => {
    const busy = await occupyPort();
    const vehicle = new Vehicle(
      { ...testConfig(), httpPort: busy.port, actuator: 'device' },
      { sink: new RecordingSink(), encoder: tinyEncoder }
    );
    await expect(vehicle.start()).rejects.toBeInstanceOf(ResourceUnavailableError);

    const exited = vehicle.waitForExit(1000);
    vehicle.coordinator.requestShutdown('start failed');
    await exited;
    await busy.release();
  });
});

describe('createFrameSource', () => {
  it('selects the capture variant from configuration', () => {
    const base = testConfig();
    expect(createFrameSource({ ...base, capture: 'pattern' }).name).toBe('pattern');
    expect(createFrameSource({ ...base, capture: 'ffmpeg' }).name).toBe('ffmpeg');
    expect(createFrameSource({ ...base, capture: 'none' }).name).toBe('none');
  });
});
