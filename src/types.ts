export type EventSeverity = 'info' | 'warning' | 'critical';

export interface EventPayload {
  ts?: number | Date;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

export type PixelFormat = 'rgba' | 'rgb' | 'gray';

export const PIXEL_FORMAT_CHANNELS: Record<PixelFormat, 1 | 3 | 4> = {
  rgba: 4,
  rgb: 3,
  gray: 1
};

/**
 * One captured image. The pixel buffer belongs to the frame once it has been
 * handed to the acquisition loop and is never written again.
 */
export interface Frame {
  readonly seq: number;
  readonly width: number;
  readonly height: number;
  readonly format: PixelFormat;
  readonly data: Uint8Array;
  readonly capturedAt: number;
}

/** What a source hands over; the acquisition loop stamps the sequence number. */
export type CapturedImage = Omit<Frame, 'seq'>;

export interface MotionState {
  readonly detected: boolean;
  /** Sequence number of the frame this state was computed from. */
  readonly frameSeq: number;
  readonly changedRatio: number;
}

export interface LatestFrame {
  readonly frame: Frame;
  readonly motion: MotionState;
}

/** Intensities are percentages in the range [0, 100]. */
export interface RgbColor {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

export type DeviceCommand =
  | { readonly kind: 'color'; readonly color: RgbColor }
  | { readonly kind: 'off' };

export type DeviceCause = 'startup' | 'manual' | 'motion';

export interface DeviceState {
  readonly command: DeviceCommand;
  readonly autoMode: boolean;
  readonly cause: DeviceCause;
  readonly updatedAt: number;
}

export interface PublishedSnapshot {
  readonly seq: number;
  readonly width: number;
  readonly height: number;
  readonly jpeg: Buffer;
  readonly capturedAt: number;
}
