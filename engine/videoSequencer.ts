/** The parts of `HTMLVideoElement` the sequencer drives. */
export interface PlaybackSurface {
  src: string;
  currentTime: number;
  readonly duration: number;
  readonly paused: boolean;
  volume: number;
  muted: boolean;
  load(): void;
  play(): Promise<void>;
  pause(): void;
}

export type SegmentEndOutcome = 'advanced' | 'finished';

export const REWIND_STEP_SECONDS = 0.02;

/**
 * Plays a street's segments in order. Forward playback crosses segment
 * boundaries on `ended`; rewinding stays inside the current segment.
 */
export class VideoSequencer {
  private segments: string[] = [];
  private position = 0;

  constructor(private readonly surface: PlaybackSurface) {}

  get index(): number {
    return this.position;
  }

  get count(): number {
    return this.segments.length;
  }

  load(urls: readonly string[]): void {
    this.segments = [...urls];
    this.position = 0;
    this.surface.src = this.segments[0] ?? '';
    this.surface.load();
    this.surface.currentTime = 0;
    this.pause();
  }

  play(): void {
    if (!this.surface.src) return;
    // play() rejects when a load or pause interrupts it; playback simply stays stopped
    this.surface.play().catch(() => {});
  }

  pause(): void {
    if (!this.surface.paused) this.surface.pause();
  }

  handleEnded(): SegmentEndOutcome {
    if (this.position < this.segments.length - 1) {
      this.position++;
      this.surface.src = this.segments[this.position];
      this.surface.load();
      this.play();
      return 'advanced';
    }
    this.pause();
    return 'finished';
  }

  rewindStep(step = REWIND_STEP_SECONDS): void {
    const time = this.surface.currentTime;
    if (time <= step) {
      const duration = this.surface.duration;
      this.surface.currentTime = Number.isFinite(duration) ? duration : 0;
    } else {
      this.surface.currentTime = time - step;
    }
  }

  setVolume(volume: number, audible: boolean): void {
    this.surface.volume = Math.max(0, Math.min(1, volume / 100));
    this.surface.muted = !audible;
  }
}
