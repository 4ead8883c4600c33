import type { Frame, LatestFrame, MotionState } from '../types.js';

type Waiter = {
  afterSeq: number;
  resolve: (latest: LatestFrame) => void;
};

/**
 * Single-writer holder of the latest (frame, motion) pair. Publishing swaps one
 * frozen object, so readers always see a frame and the motion state computed
 * from it.
 */
export class FrameHub {
  private latest: LatestFrame | null = null;
  private readonly waiters = new Set<Waiter>();

  get sequence(): number {
    return this.latest?.frame.seq ?? 0;
  }

  publish(frame: Frame, motion: MotionState) {
    if (motion.frameSeq !== frame.seq) {
      throw new RangeError(
        `Motion state for frame ${motion.frameSeq} cannot be published with frame ${frame.seq}`
      );
    }
    if (frame.seq <= this.sequence) {
      throw new RangeError(`Frame ${frame.seq} is not newer than frame ${this.sequence}`);
    }

    const next: LatestFrame = Object.freeze({ frame, motion });
    this.latest = next;

    for (const waiter of this.waiters) {
      if (frame.seq > waiter.afterSeq) {
        this.waiters.delete(waiter);
        waiter.resolve(next);
      }
    }
  }

  readLatest(): LatestFrame | null {
    return this.latest;
  }

  readMotion(): MotionState | null {
    return this.latest?.motion ?? null;
  }

  waitForNewer(afterSeq: number, signal?: AbortSignal): Promise<LatestFrame> {
    const current = this.latest;
    if (current && current.frame.seq > afterSeq) {
      return Promise.resolve(current);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<LatestFrame>((resolve, reject) => {
      const onAbort = () => {
        this.waiters.delete(waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        afterSeq,
        resolve: latest => {
          signal?.removeEventListener('abort', onAbort);
          resolve(latest);
        }
      };
      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  get pendingWaiters(): number {
    return this.waiters.size;
  }
}

export default FrameHub;
