export type StreetType = 'video' | '3d';
export type StreetMode = 'walk' | 'drive' | 'fly' | 'sit';
export type ModeFilter = 'all' | StreetMode;

export interface VideoSegment {
  url: string;
}

export interface Street {
  _id: string;
  name?: string;
  city?: string;
  country?: string;
  lat?: number | null;
  lng?: number | null;
  type?: StreetType;
  mode?: StreetMode;
  videos?: VideoSegment[];
  // Single-file uploads carry their asset here instead of `videos`
  videoUrl?: string;
  glbUrl?: string;
  likes?: number;
  views?: number;
  createdAt?: string;
}

export interface DashboardUser {
  name?: string;
  email?: string;
  role?: string;
  is_admin?: boolean;
}

export interface DashboardTotals {
  total_streets?: number;
  total_likes?: number;
  walk_count?: number;
  drive_count?: number;
  fly_count?: number;
  sit_count?: number;
}

/** Daily view counts; `labels` are ISO dates index-aligned with `data`. */
export interface ViewsSeries {
  labels?: string[];
  data?: number[];
}

export interface TopViewEntry {
  streetId: string;
  name?: string;
  city?: string;
  country?: string;
  mode?: StreetMode;
  views?: number;
}

export interface ActivityEntry {
  eventType?: string;
  streetId?: string;
  streetName?: string;
  city?: string;
  country?: string;
  mode?: StreetMode;
  timestamp?: string;
}

export interface DashboardSummary {
  user?: DashboardUser | null;
  totals?: DashboardTotals;
  views_chart?: ViewsSeries;
  top_views?: TopViewEntry[];
  top_likes?: Street[];
  recent?: ActivityEntry[];
  streets?: Street[];
}

export type Direction = 'forward' | 'reverse' | 'neutral';
export type Gear = 'R' | 'N' | '1' | '2' | '3' | '4';

export interface DriveState {
  index: number;
  videoIndex: number;
  speed: number; // 0 - 100
  targetSpeed: number;
  direction: Direction;
  keyboard: Direction;
  joystick: Direction;
  fuel: number; // 0 - 100
  headBob: number; // px
  bobDir: 1 | -1;
  paused: boolean;
  settingsOpen: boolean;
  mapReady: boolean;
  transitioning: boolean;
}

export interface DriveSettings {
  auto: boolean;
  night: boolean;
  shake: boolean;
  sfx: boolean;
  audio: boolean;
  vol: number; // 0 - 100
}

export interface HudSnapshot {
  index: number;
  streetName: string;
  streetMeta: string;
  lat: number | null;
  lng: number | null;
  speed: number;
  arcOffset: number;
  gear: Gear;
  fuel: number;
  fuelHeight: number;
  headBob: number;
  direction: Direction;
  paused: boolean;
  settingsOpen: boolean;
  mapReady: boolean;
  transitioning: boolean;
  videoIndex: number;
  segmentCount: number;
}
