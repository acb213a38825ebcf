import dgram from 'dgram';
import { afterAll, afterEach, describe, expect, it, vi } from 'vitest';
import type { ImageProbe, ProbedFrame, ProbeResult } from './imageProbe';
import { type FrameRenderer, MediaReceiver } from './mediaReceiver';

class RecordingRenderer implements FrameRenderer {
  readonly name = 'recording';
  readonly frames: ProbedFrame[] = [];

  render(frame: ProbedFrame): void {
    this.frames.push(frame);
  }

  async close(): Promise<void> {}
}

/** Treats any datagram starting with "img" as a 1x1 frame. */
class PrefixProbe implements ImageProbe {
  calls = 0;
  gate: Promise<void> | null = null;

  async probe(bytes: Buffer): Promise<ProbeResult | null> {
    this.calls += 1;
    const gate = this.gate;
    this.gate = null;
    if (gate) await gate;
    return bytes.toString('utf8').startsWith('img') ? { bytes, width: 1, height: 1 } : null;
  }
}

describe('MediaReceiver', () => {
  const sender = dgram.createSocket('udp4');
  let receiver: MediaReceiver | undefined;

  afterEach(async () => {
    receiver?.stop();
    await receiver?.done();
    receiver = undefined;
  });

  afterAll(() => {
    sender.close();
  });

  function send(port: number, text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      sender.send(Buffer.from(text), port, '127.0.0.1', (err) => (err ? reject(err) : resolve()));
    });
  }

  it('renders decodable datagrams and counts the rest', async () => {
    const renderer = new RecordingRenderer();
    const active = new MediaReceiver(new PrefixProbe(), renderer, { host: '127.0.0.1', port: 0, clock: () => 1234 });
    receiver = active;
    const port = await active.start();

    await send(port, 'img-1');
    await send(port, 'garbage');
    await send(port, 'img-2');

    await vi.waitFor(() => expect(active.stats().received).toBe(3));
    await vi.waitFor(() => expect(active.stats()).toEqual({ received: 3, rendered: 2, dropped: 1, stale: 0 }));
    expect(renderer.frames.map((frame) => frame.bytes.toString('utf8'))).toEqual(['img-1', 'img-2']);
    expect(renderer.frames[0]).toMatchObject({ width: 1, height: 1, receivedAt: 1234 });
  });

  it('discards a frame that finishes probing after a newer one was shown', async () => {
    const renderer = new RecordingRenderer();
    const probe = new PrefixProbe();
    const active = new MediaReceiver(probe, renderer, { host: '127.0.0.1', port: 0 });
    receiver = active;
    const port = await active.start();

    let release: () => void = () => undefined;
    probe.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    await send(port, 'img-old');
    await vi.waitFor(() => expect(probe.calls).toBe(1));
    await send(port, 'img-new');
    await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));

    release();
    await vi.waitFor(() => expect(active.stats().stale).toBe(1));
    expect(renderer.frames.map((frame) => frame.bytes.toString('utf8'))).toEqual(['img-new']);
  });

  it('stops receiving once stopped', async () => {
    const active = new MediaReceiver(new PrefixProbe(), new RecordingRenderer(), { host: '127.0.0.1', port: 0 });
    const port = await active.start();
    active.stop();
    await active.done();
    active.stop();
    await send(port, 'img-late');
    expect(active.stats().received).toBe(0);
  });
});
