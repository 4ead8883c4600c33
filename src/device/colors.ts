import { InvalidColorError } from '../errors.js';
import type { DeviceCommand, RgbColor } from '../types.js';

type NamedColor = {
  name: string;
  fractions: readonly [number, number, number];
};

const NAMED_COLORS: readonly NamedColor[] = [
  { name: 'Blue', fractions: [0, 0, 1] },
  { name: 'Violet', fractions: [0.5, 0, 0.5] },
  { name: 'Green', fractions: [0, 1, 0] },
  { name: 'Red', fractions: [1, 0, 0] },
  { name: 'Yellow', fractions: [1, 1, 0] },
  { name: 'White', fractions: [1, 1, 1] },
  { name: 'Off', fractions: [0, 0, 0] }
];

export const OFF_COLOR: RgbColor = Object.freeze({ red: 0, green: 0, blue: 0 });
export const WHITE_COLOR: RgbColor = Object.freeze({ red: 100, green: 100, blue: 100 });
export const BLUE_COLOR: RgbColor = Object.freeze({ red: 0, green: 0, blue: 100 });

/** Nearest tenth of the binary fraction, so 95% (0.9499...) rounds down to 0.9. */
function roundFraction(percent: number) {
  return Number((percent / 100).toFixed(1));
}

/** "Red", "Violet", ... or `Custom (R%, G%, B%)` when no preset matches. */
export function friendlyColorName(color: RgbColor): string {
  const rounded = [roundFraction(color.red), roundFraction(color.green), roundFraction(color.blue)];
  const match = NAMED_COLORS.find(candidate =>
    candidate.fractions.every((value, index) => value === rounded[index])
  );
  if (match) {
    return match.name;
  }
  return `Custom (${Math.trunc(color.red)}%, ${Math.trunc(color.green)}%, ${Math.trunc(color.blue)}%)`;
}

export function commandColor(command: DeviceCommand): RgbColor {
  return command.kind === 'color' ? command.color : OFF_COLOR;
}

export function commandName(command: DeviceCommand): string {
  return command.kind === 'color' ? friendlyColorName(command.color) : 'Off';
}

export function sameCommand(a: DeviceCommand, b: DeviceCommand): boolean {
  if (a.kind === 'off' || b.kind === 'off') {
    return a.kind === b.kind;
  }
  return a.color.red === b.color.red && a.color.green === b.color.green && a.color.blue === b.color.blue;
}

export function validateColor(input: { red: unknown; green: unknown; blue: unknown }): RgbColor {
  const channels = ['red', 'green', 'blue'] as const;
  const values: number[] = [];
  for (const channel of channels) {
    const value = input[channel];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidColorError(`${channel} must be a finite number`);
    }
    if (value < 0 || value > 100) {
      throw new InvalidColorError(`${channel} must be between 0 and 100 (got ${value})`);
    }
    values.push(value);
  }
  return Object.freeze({ red: values[0], green: values[1], blue: values[2] });
}
