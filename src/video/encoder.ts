import sharp from 'sharp';
import { PIXEL_FORMAT_CHANNELS, type Frame } from '../types.js';

export type EncodeOptions = {
  quality: number;
  /** Target size; omitted means full resolution. */
  width?: number;
  height?: number;
};

export interface FrameEncoder {
  encode(frame: Frame, options: EncodeOptions): Promise<Buffer>;
}

/** JPEG encoding on libuv's thread pool. */
export class SharpFrameEncoder implements FrameEncoder {
  async encode(frame: Frame, options: EncodeOptions): Promise<Buffer> {
    let pipeline = sharp(frame.data, {
      raw: {
        width: frame.width,
        height: frame.height,
        channels: PIXEL_FORMAT_CHANNELS[frame.format]
      }
    });

    const width = options.width ?? frame.width;
    const height = options.height ?? frame.height;
    if (width !== frame.width || height !== frame.height) {
      pipeline = pipeline.resize(width, height, { fit: 'fill', fastShrinkOnLoad: true });
    }

    return pipeline.jpeg({ quality: options.quality }).toBuffer();
  }
}

export default SharpFrameEncoder;
