import type { Direction, DriveState, Gear } from '../types';

export const CRUISE_SPEED = 75;
export const REVERSE_SPEED = 25;
/** Fraction of the remaining gap to the target speed closed on every frame. */
export const SPEED_SMOOTHING = 0.15;
/** Fuel points burned per unit of speed per millisecond. */
export const FUEL_BURN_RATE = 0.001;
export const JOYSTICK_DEAD_ZONE = 0.2;
export const SPEED_ARC_LENGTH = 251.2;
export const FUEL_BAR_HEIGHT = 70;

const BOB_STEP = 0.4;
const BOB_LIMIT = 3;
const BOB_DECAY = 0.9;

export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));
export const lerp = (a: number, b: number, t: number) => a + (b - a) * t;

export function createDriveState(index = -1): DriveState {
  return {
    index,
    videoIndex: 0,
    speed: 0,
    targetSpeed: 0,
    direction: 'neutral',
    keyboard: 'neutral',
    joystick: 'neutral',
    fuel: 100,
    headBob: 0,
    bobDir: 1,
    paused: false,
    settingsOpen: false,
    mapReady: false,
    transitioning: false
  };
}

export interface DirectionInputs {
  keyboard: Direction;
  joystick: Direction;
  autopilot: boolean;
}

/** Keyboard beats joystick, joystick beats autopilot; autopilot only ever drives forward. */
export function resolveDirection({ keyboard, joystick, autopilot }: DirectionInputs): Direction {
  if (keyboard !== 'neutral') return keyboard;
  if (joystick !== 'neutral') return joystick;
  return autopilot ? 'forward' : 'neutral';
}

export function targetSpeedFor(direction: Direction): number {
  if (direction === 'forward') return CRUISE_SPEED;
  if (direction === 'reverse') return REVERSE_SPEED;
  return 0;
}

const FORWARD_KEYS = new Set(['ArrowUp', 'w', 'W']);
const REVERSE_KEYS = new Set(['ArrowDown', 's', 'S']);

export function directionForKey(key: string): Direction | null {
  if (FORWARD_KEYS.has(key)) return 'forward';
  if (REVERSE_KEYS.has(key)) return 'reverse';
  return null;
}

/**
 * Maps a pointer offset from the joystick centre to a direction. Only the
 * vertical component counts, and it must clear the dead zone; screen y grows
 * downward, so pushing up means forward.
 */
export function joystickDirection(dx: number, dy: number, radius: number): Direction {
  if (!(radius > 0) || !Number.isFinite(dx) || !Number.isFinite(dy)) return 'neutral';
  const dist = Math.min(1, Math.hypot(dx, dy) / radius);
  const angle = Math.atan2(dy, dx);
  const moveY = -Math.sin(angle) * dist;
  if (Math.abs(moveY) <= JOYSTICK_DEAD_ZONE) return 'neutral';
  return moveY > 0 ? 'forward' : 'reverse';
}

export function deriveGear(speed: number, direction: Direction): Gear {
  if (direction === 'reverse') return 'R';
  const spd = clamp(speed, 0, 100);
  if (spd < 2) return 'N';
  if (spd < 30) return '1';
  if (spd < 55) return '2';
  if (spd < 80) return '3';
  return '4';
}

export type GearKind = 'reverse' | 'neutral' | 'drive';

export const gearKind = (gear: Gear): GearKind => (gear === 'R' ? 'reverse' : gear === 'N' ? 'neutral' : 'drive');

export interface FrameOptions {
  shake: boolean;
}

/**
 * Advances the continuous variables by one rendered frame. Smoothing is a
 * fixed per-frame factor, so higher refresh rates converge sooner; fuel burn
 * is scaled by the elapsed milliseconds and never goes below zero.
 */
export function stepFrame(state: DriveState, dtMs: number, { shake }: FrameOptions): DriveState {
  const dt = Number.isFinite(dtMs) ? Math.max(0, dtMs) : 0;

  let { headBob, bobDir } = state;
  if (!state.paused && shake && state.direction !== 'neutral') {
    headBob += bobDir * BOB_STEP * (state.speed / 60);
    if (headBob > BOB_LIMIT || headBob < -BOB_LIMIT) bobDir = bobDir === 1 ? -1 : 1;
  } else {
    headBob *= BOB_DECAY;
  }

  const speed = lerp(state.speed, state.targetSpeed, SPEED_SMOOTHING);
  const fuel = Math.max(0, state.fuel - speed * FUEL_BURN_RATE * dt);

  return { ...state, speed, fuel, headBob, bobDir };
}

export const speedArcOffset = (speed: number) => SPEED_ARC_LENGTH - (SPEED_ARC_LENGTH * clamp(speed, 0, 100)) / 100;

export const fuelBarHeight = (fuel: number) => (clamp(fuel, 0, 100) / 100) * FUEL_BAR_HEIGHT;
