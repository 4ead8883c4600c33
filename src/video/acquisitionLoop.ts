import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import eventBus, { type EventSink } from '../eventBus.js';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { CaptureRetriesExhaustedError, SourceUnavailableError } from '../errors.js';
import type { Frame, MotionState } from '../types.js';
import type { FrameHub } from './frameHub.js';
import type { MotionDetector } from './motionDetector.js';
import type { FrameSource } from './source.js';

const COMPONENT = 'acquisition';
const DEFAULT_FRAMES_PER_SECOND = 60;
const DEFAULT_RETRY_DELAY_MS = 200;
const DEFAULT_MAX_CONSECUTIVE_FAILURES = 50;

export type AcquisitionStatus = 'idle' | 'running' | 'degraded' | 'failed' | 'stopped';

export type MotionTransitionHandler = (detected: boolean, motion: MotionState) => unknown;

export type CycleEvent = {
  seq: number;
  durationMs: number;
  detected: boolean;
};

export interface AcquisitionLoopOptions {
  source: FrameSource;
  detector: MotionDetector;
  hub: FrameHub;
  onMotionTransition?: MotionTransitionHandler;
  framesPerSecond?: number;
  retryDelayMs?: number;
  maxConsecutiveFailures?: number;
  bus?: EventSink;
  sourceName?: string;
}

/**
 * The single producer of the pipeline: capture, detect, publish, and report
 * motion edges. Nothing it calls downstream is awaited except the capture.
 */
export class AcquisitionLoop extends EventEmitter {
  private readonly options: AcquisitionLoopOptions;
  private readonly bus: EventSink;
  private currentStatus: AcquisitionStatus = 'idle';
  private loopPromise: Promise<void> | null = null;
  private stopRequested = false;
  private seq = 0;
  private lastDetected = false;
  private consecutiveFailures = 0;
  private lastError: Error | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(options: AcquisitionLoopOptions) {
    super();
    this.options = options;
    this.bus = options.bus ?? eventBus;
  }

  get status(): AcquisitionStatus {
    return this.currentStatus;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  get lastCaptureError(): Error | null {
    return this.lastError;
  }

  start() {
    if (this.loopPromise) {
      return;
    }

    this.stopRequested = false;
    this.consecutiveFailures = 0;
    this.seq = this.options.hub.sequence;
    this.setStatus('running');
    this.loopPromise = this.run().finally(() => {
      this.loopPromise = null;
    });
  }

  async stop(): Promise<void> {
    this.stopRequested = true;
    this.interruptWait();
    const running = this.loopPromise;
    if (running) {
      await running;
    }
    if (this.currentStatus !== 'failed') {
      this.setStatus('stopped');
    }
  }

  private async run(): Promise<void> {
    const frameIntervalMs = 1000 / (this.options.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND);

    while (!this.stopRequested) {
      const cycleStart = performance.now();
      const captured = await this.captureOnce();
      if (this.stopRequested) {
        break;
      }

      if (!captured.ok) {
        if (captured.fatal) {
          return;
        }
        await this.waitFor(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
        continue;
      }

      this.processFrame(captured.frame, cycleStart);

      const elapsed = performance.now() - cycleStart;
      await this.waitFor(Math.max(0, frameIntervalMs - elapsed));
    }
  }

  private async captureOnce(): Promise<
    { ok: true; frame: Frame } | { ok: false; fatal: boolean }
  > {
    try {
      const image = await this.options.source.captureHighRes();
      if (this.consecutiveFailures > 0) {
        logger.info(
          { component: COMPONENT, failures: this.consecutiveFailures },
          'Frame capture recovered'
        );
        this.consecutiveFailures = 0;
        this.lastError = null;
      }
      if (this.currentStatus === 'degraded') {
        this.setStatus('running');
      }

      this.seq += 1;
      const frame: Frame = Object.freeze({ ...image, seq: this.seq });
      return { ok: true, frame };
    } catch (error) {
      if (this.stopRequested) {
        return { ok: false, fatal: false };
      }
      return { ok: false, fatal: this.handleCaptureFailure(error) };
    }
  }

  private handleCaptureFailure(error: unknown): boolean {
    const err =
      error instanceof SourceUnavailableError
        ? error
        : new SourceUnavailableError('Frame capture failed', error);
    this.consecutiveFailures += 1;
    this.lastError = err;
    metrics.incrementCounter('acquisition.capture_failures');
    metrics.recordDetectorError(COMPONENT, err.message);
    logger.warn(
      { component: COMPONENT, err, failures: this.consecutiveFailures },
      'Frame capture failed'
    );

    if (this.consecutiveFailures === 1) {
      this.bus.emitEvent({
        source: this.options.sourceName ?? 'camera',
        detector: COMPONENT,
        severity: 'warning',
        message: 'Frame capture failed',
        meta: { error: err.message }
      });
    }

    const maxFailures = this.options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    if (this.consecutiveFailures < maxFailures) {
      this.setStatus('degraded');
      return false;
    }

    const fatal = new CaptureRetriesExhaustedError(this.consecutiveFailures, err);
    this.setStatus('failed');
    logger.error({ component: COMPONENT, err: fatal }, 'Frame capture retries exhausted');
    this.bus.emitEvent({
      source: this.options.sourceName ?? 'camera',
      detector: COMPONENT,
      severity: 'critical',
      message: fatal.message,
      meta: { attempts: fatal.attempts, error: err.message }
    });
    this.emit('fatal', fatal);
    return true;
  }

  private processFrame(frame: Frame, cycleStart: number) {
    let motion: MotionState;
    try {
      motion = this.options.detector.process(frame);
    } catch (error) {
      metrics.incrementCounter('acquisition.detector_errors');
      logger.error({ component: COMPONENT, err: error, seq: frame.seq }, 'Motion detection failed');
      motion = { detected: this.lastDetected, frameSeq: frame.seq, changedRatio: 0 };
    }

    this.options.hub.publish(frame, motion);
    metrics.incrementCounter('acquisition.frames');
    metrics.setGauge('acquisition.last_seq', frame.seq);
    metrics.setGauge('motion.changed_ratio', motion.changedRatio);

    if (motion.detected !== this.lastDetected) {
      this.lastDetected = motion.detected;
      this.reportTransition(motion);
    }

    const durationMs = performance.now() - cycleStart;
    metrics.observeLatency('acquisition.cycle', durationMs);
    this.emit('cycle', { seq: frame.seq, durationMs, detected: motion.detected } satisfies CycleEvent);
  }

  private reportTransition(motion: MotionState) {
    metrics.setGauge('motion.detected', motion.detected ? 1 : 0);
    metrics.incrementCounter(motion.detected ? 'motion.started' : 'motion.cleared');
    this.bus.emitEvent({
      source: this.options.sourceName ?? 'camera',
      detector: 'motion',
      severity: 'info',
      message: motion.detected ? 'Motion detected' : 'Motion cleared',
      meta: { seq: motion.frameSeq, changedRatio: motion.changedRatio }
    });

    const handler = this.options.onMotionTransition;
    if (!handler) {
      return;
    }

    void Promise.resolve()
      .then(() => handler(motion.detected, motion))
      .catch(error => {
        logger.error(
          { component: COMPONENT, err: error, detected: motion.detected },
          'Motion transition handler failed'
        );
      });
  }

  private waitFor(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private interruptWait() {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private setStatus(status: AcquisitionStatus) {
    if (this.currentStatus === status) {
      return;
    }
    const previous = this.currentStatus;
    this.currentStatus = status;
    this.emit('status', status, previous);
  }
}

export default AcquisitionLoop;
