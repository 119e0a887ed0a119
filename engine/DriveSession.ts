import type { Direction, DriveSettings, DriveState, HudSnapshot, Street } from '../types';
import { formatPlace, streetSegments } from '../utils/streets';
import {
  createDriveState,
  deriveGear,
  fuelBarHeight,
  resolveDirection,
  speedArcOffset,
  stepFrame,
  targetSpeedFor
} from './driveEngine';
import { VideoSequencer, type PlaybackSurface } from './videoSequencer';

export interface FrameScheduler {
  request(callback: (now: number) => void): number;
  cancel(handle: number): void;
}

export const browserFrameScheduler: FrameScheduler = {
  request: callback => window.requestAnimationFrame(callback),
  cancel: handle => window.cancelAnimationFrame(handle)
};

export const STREET_TRANSITION_MS = 250;

export interface DriveSessionOptions {
  streets: readonly Street[];
  surface: PlaybackSurface;
  settings: DriveSettings;
  scheduler?: FrameScheduler;
  transitionMs?: number;
}

type HudListener = (snapshot: HudSnapshot) => void;

/**
 * One drive through the embedded street collection. Input handlers only move
 * intents and the target speed; `tick` is the single writer of speed, fuel
 * and head-bob.
 */
export class DriveSession {
  private state: DriveState = createDriveState();
  private street: Street | null = null;
  private settings: DriveSettings;
  private readonly streets: readonly Street[];
  private readonly sequencer: VideoSequencer;
  private readonly scheduler: FrameScheduler;
  private readonly transitionMs: number;
  private readonly listeners = new Set<HudListener>();

  private lastFrame: number | null = null;
  private frameHandle: number | null = null;
  private transitionTimer: ReturnType<typeof setTimeout> | null = null;
  private rewinding = false;
  private rewindToken = 0;
  private disposed = false;

  constructor({ streets, surface, settings, scheduler, transitionMs }: DriveSessionOptions) {
    this.streets = streets;
    this.settings = { ...settings };
    this.sequencer = new VideoSequencer(surface);
    this.scheduler = scheduler ?? browserFrameScheduler;
    this.transitionMs = transitionMs ?? STREET_TRANSITION_MS;
    this.sequencer.setVolume(this.settings.vol, this.settings.audio);
  }

  getState(): Readonly<DriveState> {
    return this.state;
  }

  subscribe(listener: HudListener): () => void {
    this.listeners.add(listener);
    listener(this.snapshot());
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): HudSnapshot {
    const { state, street } = this;
    return {
      index: state.index,
      streetName: street ? street.name || 'Street' : '',
      streetMeta: street ? formatPlace(street.city, street.country) : '',
      lat: typeof street?.lat === 'number' ? street.lat : null,
      lng: typeof street?.lng === 'number' ? street.lng : null,
      speed: Math.round(Math.max(0, Math.min(100, state.speed))),
      arcOffset: speedArcOffset(state.speed),
      gear: deriveGear(state.speed, state.direction),
      fuel: state.fuel,
      fuelHeight: fuelBarHeight(state.fuel),
      headBob: state.headBob,
      direction: state.direction,
      paused: state.paused,
      settingsOpen: state.settingsOpen,
      mapReady: state.mapReady,
      transitioning: state.transitioning,
      videoIndex: state.videoIndex,
      segmentCount: this.sequencer.count
    };
  }

  /** Loads the pre-selected street when it is in the collection, else the first one. */
  start(selected: Street | null): void {
    if (!this.streets.length) {
      console.warn('No streets to drive; the session stays idle.');
      return;
    }
    const index = selected ? this.streets.findIndex(s => s._id === selected._id) : -1;
    this.selectStreet(index !== -1 ? index : 0);
  }

  /** Starts the per-frame loop; it runs until `dispose`. */
  run(): void {
    if (this.frameHandle !== null || this.disposed) return;
    const loop = (now: number) => {
      this.tick(now);
      if (!this.disposed) this.frameHandle = this.scheduler.request(loop);
    };
    this.frameHandle = this.scheduler.request(loop);
  }

  tick(now: number): void {
    const dt = this.lastFrame === null ? 0 : now - this.lastFrame;
    this.lastFrame = now;
    this.state = stepFrame(this.state, dt, { shake: this.settings.shake });
    this.emit();
  }

  /**
   * Fades out, then swaps in the new street after the transition so the HUD
   * never shows the old street's name against the new video.
   */
  selectStreet(index: number): void {
    if (this.disposed) return;
    if (!Number.isInteger(index) || index < 0 || index >= this.streets.length) {
      console.warn(`Ignoring selection of unknown street #${index}`);
      return;
    }

    this.state = { ...this.state, index, transitioning: true };
    this.emit();

    if (this.transitionTimer !== null) clearTimeout(this.transitionTimer);
    this.transitionTimer = setTimeout(() => {
      this.transitionTimer = null;
      this.loadStreet(index);
    }, this.transitionMs);
  }

  private loadStreet(index: number): void {
    const street = this.streets[index];
    const { paused, settingsOpen, mapReady } = this.state;

    this.street = street;
    this.stopRewind();
    this.state = { ...createDriveState(index), paused, settingsOpen, mapReady };
    this.sequencer.load(streetSegments(street));
    this.emit();
    if (this.settings.auto) this.applyDirection();
  }

  setKeyboardIntent(direction: Direction): void {
    this.state = { ...this.state, keyboard: direction };
    this.applyDirection();
  }

  setJoystickIntent(direction: Direction): void {
    this.state = { ...this.state, joystick: direction };
    this.applyDirection();
  }

  updateSettings(settings: DriveSettings): void {
    this.settings = { ...settings };
    this.sequencer.setVolume(settings.vol, settings.audio);
    this.applyDirection();
  }

  /** Space bar: drop the target speed without touching the direction. */
  brake(): void {
    this.state = { ...this.state, targetSpeed: 0 };
    this.emit();
  }

  togglePause(): void {
    this.state = { ...this.state, paused: !this.state.paused };
    this.applyDirection();
  }

  setSettingsOpen(open: boolean): void {
    this.state = { ...this.state, settingsOpen: open };
    this.emit();
  }

  markMapReady(): void {
    if (this.state.mapReady) return;
    this.state = { ...this.state, mapReady: true };
    this.emit();
  }

  handleSegmentEnded(): void {
    const outcome = this.sequencer.handleEnded();
    if (outcome === 'advanced') {
      this.state = { ...this.state, videoIndex: this.sequencer.index };
    } else {
      this.state = { ...this.state, targetSpeed: 0 };
    }
    this.emit();
  }

  applyDirection(): void {
    if (this.disposed) return;
    const { keyboard, joystick, paused } = this.state;
    const direction = paused ? 'neutral' : resolveDirection({ keyboard, joystick, autopilot: this.settings.auto });

    this.state = { ...this.state, direction, targetSpeed: targetSpeedFor(direction) };

    if (direction === 'forward') {
      this.sequencer.play();
    } else {
      this.sequencer.pause();
      if (direction === 'reverse') this.startRewind();
    }
    this.emit();
  }

  /** Scrubs backwards once per frame until the direction leaves reverse. */
  private startRewind(): void {
    if (this.rewinding) return;
    this.rewinding = true;
    const token = ++this.rewindToken;
    const step = () => {
      if (token !== this.rewindToken) return;
      if (this.disposed || this.state.direction !== 'reverse') {
        this.rewinding = false;
        return;
      }
      this.sequencer.rewindStep();
      this.scheduler.request(step);
    };
    step();
  }

  private stopRewind(): void {
    this.rewinding = false;
    this.rewindToken++;
  }

  dispose(): void {
    this.disposed = true;
    this.stopRewind();
    if (this.frameHandle !== null) this.scheduler.cancel(this.frameHandle);
    if (this.transitionTimer !== null) clearTimeout(this.transitionTimer);
    this.frameHandle = null;
    this.transitionTimer = null;
    this.listeners.clear();
    this.sequencer.pause();
  }

  private emit(): void {
    if (!this.listeners.size) return;
    const snapshot = this.snapshot();
    this.listeners.forEach(listener => listener(snapshot));
  }
}
