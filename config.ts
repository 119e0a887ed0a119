import type { Street } from './types';

export interface AppRoutes {
  apiSummaryUrl: string;
  world3d: string;
  worldDrive: string;
  worldFly: string;
  worldSit: string;
  worldBase: string;
  mapTileUrl: string;
}

export const DEFAULT_ROUTES: AppRoutes = {
  apiSummaryUrl: process.env.SUMMARY_URL || '/api/dashboard/summary',
  world3d: process.env.WORLD_3D_URL || '/world/3d',
  worldDrive: process.env.WORLD_DRIVE_URL || '/world/drive',
  worldFly: process.env.WORLD_FLY_URL || '/world/fly',
  worldSit: process.env.WORLD_SIT_URL || '/world/sit',
  worldBase: process.env.WORLD_BASE_URL || '/world',
  mapTileUrl: process.env.MAP_TILE_URL || 'https://{s}.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}{r}.png'
};

const ROUTE_KEYS: (keyof AppRoutes)[] = [
  'apiSummaryUrl',
  'world3d',
  'worldDrive',
  'worldFly',
  'worldSit',
  'worldBase',
  'mapTileUrl'
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads a JSON blob the server embedded in a `<script type="application/json">` tag.
 * Missing tags and unparseable content fall back without throwing.
 */
export function readJsonBlob(id: string, doc: Document = document): unknown {
  const el = doc.getElementById(id);
  const raw = el?.textContent?.trim();
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.warn(`Embedded data "${id}" is not valid JSON; using defaults.`, error);
    return undefined;
  }
}

/** Overlays the string fields of `overrides` on top of the build-time defaults. */
export function resolveRoutes(overrides: unknown, defaults: AppRoutes = DEFAULT_ROUTES): AppRoutes {
  const routes = { ...defaults };
  if (!isRecord(overrides)) return routes;
  for (const key of ROUTE_KEYS) {
    const value = overrides[key];
    if (typeof value === 'string' && value.trim()) routes[key] = value.trim();
  }
  return routes;
}

export const isStreet = (value: unknown): value is Street =>
  isRecord(value) && typeof value._id === 'string' && value._id.length > 0;

export interface DriveBootstrap {
  routes: AppRoutes;
  streets: Street[];
  selected: Street | null;
}

export function readDriveBootstrap(doc: Document = document): DriveBootstrap {
  const rawStreets = readJsonBlob('streets-data', doc);
  const rawSelected = readJsonBlob('selected-street-data', doc);

  if (rawStreets !== undefined && !Array.isArray(rawStreets)) {
    console.warn('Embedded street collection is not an array; starting empty.');
  }
  const streets = Array.isArray(rawStreets) ? rawStreets.filter(isStreet) : [];

  return {
    routes: resolveRoutes(readJsonBlob('app-config', doc)),
    streets,
    selected: isStreet(rawSelected) ? rawSelected : null
  };
}

export const appRoutes: AppRoutes =
  typeof document === 'undefined' ? DEFAULT_ROUTES : resolveRoutes(readJsonBlob('app-config'));
