import sharp from 'sharp';
import { describeError } from '../../shared/src/errors';
import { mediaLog } from '../../shared/src/logger';

export interface ProbedFrame {
  bytes: Buffer;
  width: number;
  height: number;
  receivedAt: number;
}

export type ProbeResult = Omit<ProbedFrame, 'receivedAt'>;

/** Decides whether a datagram is a displayable frame. */
export interface ImageProbe {
  probe(bytes: Buffer): Promise<ProbeResult | null>;
}

/** JPEG files start with an SOI marker, FF D8. */
export function hasJpegMarker(bytes: Buffer): boolean {
  return bytes.length >= 4 && bytes[0] === 0xff && bytes[1] === 0xd8;
}

export class SharpImageProbe implements ImageProbe {
  async probe(bytes: Buffer): Promise<ProbeResult | null> {
    if (!hasJpegMarker(bytes)) return null;
    // A full decode; a header alone survives truncation.
    try {
      const { info } = await sharp(bytes, { failOn: 'truncated' }).raw().toBuffer({ resolveWithObject: true });
      if (!info.width || !info.height) return null;
      return { bytes, width: info.width, height: info.height };
    } catch (err) {
      mediaLog.debug('JPEG did not decode', describeError(err));
      return null;
    }
  }
}
