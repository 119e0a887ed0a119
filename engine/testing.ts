import type { FrameScheduler } from './DriveSession';
import type { PlaybackSurface } from './videoSequencer';

/** In-memory stand-in for a `<video>` element. */
export class FakeSurface implements PlaybackSurface {
  src = '';
  currentTime = 0;
  duration = 10;
  paused = true;
  volume = 1;
  muted = false;
  loads = 0;
  plays = 0;
  rejectPlay = false;

  load(): void {
    this.loads++;
    this.paused = true;
  }

  play(): Promise<void> {
    this.plays++;
    if (this.rejectPlay) return Promise.reject(new Error('NotAllowedError'));
    this.paused = false;
    return Promise.resolve();
  }

  pause(): void {
    this.paused = true;
  }
}

/** Frame scheduler that only runs callbacks when the test flushes it. */
export class ManualScheduler implements FrameScheduler {
  private queue = new Map<number, (now: number) => void>();
  private nextHandle = 1;
  now = 0;

  request(callback: (now: number) => void): number {
    const handle = this.nextHandle++;
    this.queue.set(handle, callback);
    return handle;
  }

  cancel(handle: number): void {
    this.queue.delete(handle);
  }

  get pending(): number {
    return this.queue.size;
  }

  /** Runs every callback queued before the call, advancing the clock by `dt`. */
  flush(dt = 16): void {
    this.now += dt;
    const due = [...this.queue.values()];
    this.queue.clear();
    due.forEach(callback => callback(this.now));
  }
}
