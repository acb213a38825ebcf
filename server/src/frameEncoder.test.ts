import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { TestPatternSource } from './capture';
import { SharpJpegEncoder } from './frameEncoder';

describe('SharpJpegEncoder', () => {
  it('scales a raw frame to the output size as JPEG', async () => {
    const source = new TestPatternSource(64, 48);
    await source.open();
    const frame = await source.read();
    expect(frame).not.toBeNull();
    if (!frame) return;

    const jpeg = await new SharpJpegEncoder().encode(frame);
    expect([jpeg[0], jpeg[1]]).toEqual([0xff, 0xd8]);

    const meta = await sharp(jpeg).metadata();
    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(320);
    expect(meta.height).toBe(240);
  });

  it('rejects a buffer that does not match the declared geometry', async () => {
    const encoder = new SharpJpegEncoder();
    await expect(
      encoder.encode({ width: 320, height: 240, channels: 3, data: Buffer.alloc(10) })
    ).rejects.toThrow();
  });
});
