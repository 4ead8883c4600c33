import type { Frame, MotionState } from '../types.js';
import { GrayscaleFrame, frameDiffStats, gaussianBlur, toGrayscale } from './utils.js';

export interface MotionDetectorOptions {
  diffThreshold?: number;
  areaThreshold?: number;
  referenceRefreshFrames?: number;
  sampleStep?: number;
  blur?: boolean;
}

const DEFAULT_DIFF_THRESHOLD = 25;
const DEFAULT_AREA_THRESHOLD = 0.0025;
const DEFAULT_REFERENCE_REFRESH_FRAMES = 60;
const DEFAULT_SAMPLE_STEP = 2;

type ResolvedOptions = Required<MotionDetectorOptions>;

function resolveOptions(options: MotionDetectorOptions): ResolvedOptions {
  return {
    diffThreshold: options.diffThreshold ?? DEFAULT_DIFF_THRESHOLD,
    areaThreshold: options.areaThreshold ?? DEFAULT_AREA_THRESHOLD,
    referenceRefreshFrames: Math.max(
      1,
      Math.floor(options.referenceRefreshFrames ?? DEFAULT_REFERENCE_REFRESH_FRAMES)
    ),
    sampleStep: Math.max(1, Math.floor(options.sampleStep ?? DEFAULT_SAMPLE_STEP)),
    blur: options.blur ?? false
  };
}

/**
 * Frame differencing against a reference that is refreshed on a fixed cadence
 * rather than every frame, so slow lighting drift is absorbed while a person
 * standing still in view keeps registering.
 */
export class MotionDetector {
  private options: ResolvedOptions;
  private reference: GrayscaleFrame | null = null;
  private framesSinceRefresh = 0;

  constructor(options: MotionDetectorOptions = {}) {
    this.options = resolveOptions(options);
  }

  getOptions(): Readonly<ResolvedOptions> {
    return this.options;
  }

  updateOptions(options: MotionDetectorOptions) {
    const previous = this.options;
    const next = resolveOptions({ ...previous, ...options });
    this.options = next;

    if (previous.sampleStep !== next.sampleStep || previous.blur !== next.blur) {
      this.reset();
    }
  }

  reset() {
    this.reference = null;
    this.framesSinceRefresh = 0;
  }

  process(frame: Frame): MotionState {
    const sampled = toGrayscale(frame, this.options.sampleStep);
    const current = this.options.blur ? gaussianBlur(sampled) : sampled;

    const reference = this.reference;
    if (!reference || reference.width !== current.width || reference.height !== current.height) {
      this.reference = current;
      this.framesSinceRefresh = 0;
      return { detected: false, frameSeq: frame.seq, changedRatio: 0 };
    }

    const stats = frameDiffStats(reference, current, this.options.diffThreshold);
    const changedRatio = stats.totalPixels > 0 ? stats.changedPixels / stats.totalPixels : 0;

    this.framesSinceRefresh += 1;
    if (this.framesSinceRefresh >= this.options.referenceRefreshFrames) {
      this.reference = current;
      this.framesSinceRefresh = 0;
    }

    return {
      detected: changedRatio > this.options.areaThreshold,
      frameSeq: frame.seq,
      changedRatio
    };
  }
}

export default MotionDetector;
