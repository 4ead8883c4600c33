import { PNG } from 'pngjs';
import { PIXEL_FORMAT_CHANNELS, type CapturedImage } from '../types.js';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

type PixelSource = Pick<CapturedImage, 'width' | 'height' | 'format' | 'data'>;

export function decodePng(pngBuffer: Buffer, capturedAt = Date.now()): CapturedImage {
  const image = PNG.sync.read(pngBuffer);
  return {
    width: image.width,
    height: image.height,
    format: 'rgba',
    data: new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength),
    capturedAt
  };
}

/**
 * Rec. 709 luma of every `sampleStep`-th pixel along both axes. A step of 1
 * keeps full resolution.
 */
export function toGrayscale(frame: PixelSource, sampleStep = 1): GrayscaleFrame {
  const step = Math.max(1, Math.floor(sampleStep));
  const channels = PIXEL_FORMAT_CHANNELS[frame.format];
  const width = Math.ceil(frame.width / step);
  const height = Math.ceil(frame.height / step);
  const grayscale = new Uint8Array(width * height);
  const { data } = frame;

  let index = 0;
  for (let y = 0; y < frame.height; y += step) {
    const rowOffset = y * frame.width;
    for (let x = 0; x < frame.width; x += step) {
      const offset = (rowOffset + x) * channels;
      if (channels === 1) {
        grayscale[index] = data[offset];
      } else {
        grayscale[index] = Math.round(
          0.2126 * data[offset] + 0.7152 * data[offset + 1] + 0.0722 * data[offset + 2]
        );
      }
      index += 1;
    }
  }

  return { width, height, data: grayscale };
}

export function gaussianBlur(frame: GrayscaleFrame): GrayscaleFrame {
  const { width, height, data } = frame;
  const output = new Uint8Array(width * height);
  const kernel = [
    [1, 2, 1],
    [2, 4, 2],
    [1, 2, 1]
  ];
  const kernelSum = 16;

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let total = 0;

      for (let ky = -1; ky <= 1; ky += 1) {
        for (let kx = -1; kx <= 1; kx += 1) {
          const weight = kernel[ky + 1][kx + 1];
          const sampleX = clamp(x + kx, 0, width - 1);
          const sampleY = clamp(y + ky, 0, height - 1);
          total += data[sampleY * width + sampleX] * weight;
        }
      }

      output[y * width + x] = Math.round(total / kernelSum);
    }
  }

  return {
    width,
    height,
    data: output
  };
}

export type DiffStats = {
  totalPixels: number;
  changedPixels: number;
  meanDelta: number;
  maxDelta: number;
};

export function frameDiffStats(
  previous: GrayscaleFrame,
  current: GrayscaleFrame,
  threshold: number
): DiffStats {
  if (previous.width !== current.width || previous.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const totalPixels = current.data.length;
  let changedPixels = 0;
  let sum = 0;
  let maxDelta = 0;

  for (let i = 0; i < totalPixels; i += 1) {
    const delta = Math.abs(current.data[i] - previous.data[i]);
    sum += delta;
    if (delta > threshold) {
      changedPixels += 1;
    }
    if (delta > maxDelta) {
      maxDelta = delta;
    }
  }

  return {
    totalPixels,
    changedPixels,
    meanDelta: totalPixels > 0 ? sum / totalPixels : 0,
    maxDelta
  };
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

/** Cuts one complete PNG (signature through IEND) off the front of the buffer. */
export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}

function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
