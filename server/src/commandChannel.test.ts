import net from 'net';
import { PassThrough } from 'stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ListenerClosedError, TransportError } from '../../shared/src/errors';
import { SimulatedActuator } from './actuator';
import { ClientTargetRegistry } from './clientTargetRegistry';
import { classifyListenerError, CommandChannel, normalizeAddress, readChunks } from './commandChannel';
import { CommandSession } from './commandSession';
import { ShutdownCoordinator } from '../../shared/src/shutdown';

function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => resolve(socket));
    socket.once('error', reject);
  });
}

function readLine(socket: net.Socket): Promise<string> {
  return new Promise((resolve) => {
    let text = '';
    const onData = (chunk: Buffer): void => {
      text += chunk.toString('utf8');
      const end = text.indexOf('\n');
      if (end >= 0) {
        socket.off('data', onData);
        resolve(text.slice(0, end));
      }
    };
    socket.on('data', onData);
  });
}

describe('CommandChannel', () => {
  const cleanups: Array<() => Promise<void> | void> = [];

  afterEach(async () => {
    while (cleanups.length > 0) {
      const cleanup = cleanups.pop();
      if (cleanup) await cleanup();
    }
  });

  async function start() {
    const registry = new ClientTargetRegistry();
    const actuator = new SimulatedActuator();
    const coordinator = new ShutdownCoordinator();
    const channel = new CommandChannel(
      { registry, actuator, shutdown: coordinator },
      { host: '127.0.0.1', port: 0, signal: coordinator.signal, drainMs: 50 }
    );
    coordinator.register({ name: 'command-channel', stop: () => channel.close(), done: () => channel.done() });
    const address = await channel.listen();
    cleanups.push(() => channel.close());
    return { registry, actuator, coordinator, channel, port: address.port };
  }

  async function client(port: number): Promise<net.Socket> {
    const socket = await connect(port);
    cleanups.push(() => {
      socket.destroy();
    });
    return socket;
  }

  it('registers the peer and answers status on the same connection', async () => {
    const { registry, port } = await start();
    const socket = await client(port);

    socket.write('{"cmd":"register_video","video_port":6000}\n{"cmd":"move","direction":"forward",');
    socket.write('"speed":1.5,"steering":-3}\n{"cmd":"status"}\n');

    expect(JSON.parse(await readLine(socket))).toEqual({
      cmd: 'status_report',
      battery: 100,
      speed: 1,
      steering: -1,
    });
    expect(registry.get()).toEqual({ host: '127.0.0.1', port: 6000 });
  });

  it('clears the registration when the registering peer disconnects', async () => {
    const { registry, channel, port } = await start();
    const socket = await client(port);
    socket.write('{"cmd":"register_video","video_port":6000}\n');
    await vi.waitFor(() => expect(registry.get()).not.toBeNull());

    socket.end();
    await vi.waitFor(() => expect(registry.get()).toBeNull());
    await vi.waitFor(() => expect(channel.sessionCount()).toBe(0));
  });

  it('serves several connections independently', async () => {
    const { port, channel } = await start();
    const first = await client(port);
    const second = await client(port);
    await vi.waitFor(() => expect(channel.sessionCount()).toBe(2));

    first.write('{"cmd":"move","direction":"forward","speed":0.5,"steering":0}\n');
    await new Promise((resolve) => setTimeout(resolve, 20));
    second.write('{"cmd":"status"}\n');
    expect(JSON.parse(await readLine(second))).toMatchObject({ speed: 0.5, steering: 0 });

    first.write('{"cmd":"bogus"}\n{"cmd":"status"}\n');
    expect(JSON.parse(await readLine(first))).toMatchObject({ speed: 0.5 });
  });

  it('stops accepting after quit', async () => {
    const { coordinator, channel, port } = await start();
    const socket = await client(port);
    socket.write('{"cmd":"quit"}\n');

    await expect(coordinator.waitForShutdown()).resolves.toBe(`quit from 127.0.0.1:${socket.localPort}`);
    expect(await coordinator.join(2000)).toEqual([{ name: 'command-channel', outcome: 'stopped' }]);
    expect(channel.address()).toBeNull();
    await expect(connect(port)).rejects.toThrow();
  });
});

describe('normalizeAddress', () => {
  it('strips the IPv4-mapped prefix', () => {
    expect(normalizeAddress('::ffff:10.0.0.5')).toBe('10.0.0.5');
    expect(normalizeAddress('fe80::1')).toBe('fe80::1');
    expect(normalizeAddress(undefined)).toBe('unknown');
  });
});

describe('classifyListenerError', () => {
  it('separates our own close from genuine faults', () => {
    const live = new AbortController();
    const aborted = new AbortController();
    aborted.abort();
    const fault = Object.assign(new Error('accept failed'), { code: 'EMFILE' });
    const notRunning = Object.assign(new Error('Server is not running.'), { code: 'ERR_SERVER_NOT_RUNNING' });

    expect(classifyListenerError(fault, live.signal)).toBeInstanceOf(TransportError);
    expect(classifyListenerError(fault, aborted.signal)).toBeInstanceOf(ListenerClosedError);
    expect(classifyListenerError(notRunning, live.signal)).toBeInstanceOf(ListenerClosedError);
  });
});

describe('readChunks', () => {
  it('stops reading while a reply cannot be written', async () => {
    const stream = new PassThrough();
    let writes = 0;
    const session = new CommandSession(
      'conn-stuck',
      {
        peerAddress: '10.0.0.7',
        write: () => {
          writes++;
          return new Promise<void>(() => undefined);
        },
        end: () => undefined,
      },
      { registry: new ClientTargetRegistry(), actuator: new SimulatedActuator(), shutdown: new ShutdownCoordinator() }
    );
    readChunks(stream, session);

    stream.write('{"cmd":"status"}\n');
    await vi.waitFor(() => expect(writes).toBe(1));
    expect(stream.isPaused()).toBe(true);

    const flood = Buffer.from('{"cmd":"status"}\n{"cmd":"status"}\n');
    stream.write(flood);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(writes).toBe(1);
    expect(stream.isPaused()).toBe(true);
    expect(stream.readableLength).toBe(flood.length);
  });

  it('resumes once the chunk has been dispatched', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    let finish: () => void = () => undefined;
    readChunks(stream, {
      receive: (chunk) => {
        chunks.push(chunk.toString('utf8'));
        return new Promise<void>((resolve) => {
          finish = resolve;
        });
      },
    });

    stream.write('first');
    await vi.waitFor(() => expect(chunks).toEqual(['first']));
    expect(stream.isPaused()).toBe(true);
    stream.write('second');

    finish();
    await vi.waitFor(() => expect(chunks).toEqual(['first', 'second']));
  });
});
