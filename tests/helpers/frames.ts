import type { Frame } from '../../src/types.js';

/** Single-channel frame filled with `value`, optionally painting a bright square. */
export function grayFrame(
  seq: number,
  options: { width?: number; height?: number; value?: number; square?: { x: number; y: number; size: number; value: number } } = {}
): Frame {
  const width = options.width ?? 10;
  const height = options.height ?? 10;
  const data = new Uint8Array(width * height).fill(options.value ?? 0);
  const square = options.square;
  if (square) {
    for (let y = square.y; y < square.y + square.size && y < height; y += 1) {
      for (let x = square.x; x < square.x + square.size && x < width; x += 1) {
        data[y * width + x] = square.value;
      }
    }
  }
  return { seq, width, height, format: 'gray', data, capturedAt: 1_000 + seq };
}
