import sharp from 'sharp';
import { FRAME_HEIGHT, FRAME_WIDTH, JPEG_QUALITY } from './config';
import type { RawFrame } from './capture';

export interface FrameEncoder {
  encode(frame: RawFrame): Promise<Buffer>;
}

/** Scales to the fixed output resolution and compresses to JPEG. */
export class SharpJpegEncoder implements FrameEncoder {
  constructor(
    private readonly width = FRAME_WIDTH,
    private readonly height = FRAME_HEIGHT,
    private readonly quality = JPEG_QUALITY
  ) {}

  async encode(frame: RawFrame): Promise<Buffer> {
    return sharp(frame.data, {
      raw: { width: frame.width, height: frame.height, channels: frame.channels },
    })
      .resize(this.width, this.height, { fit: 'fill' })
      .jpeg({ quality: this.quality })
      .toBuffer();
  }
}
