import type { DriveSettings } from '../types';

/** The slice of the Web Storage API the settings need; `window.localStorage` satisfies it. */
export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const SETTINGS_KEY = 'driveSettings';

export const DEFAULT_SETTINGS: Readonly<DriveSettings> = {
  auto: false,
  night: false,
  shake: false,
  sfx: true,
  audio: false,
  vol: 50
};

const BOOLEAN_FIELDS = ['auto', 'night', 'shake', 'sfx', 'audio'] as const;

const clampVolume = (value: number) => Math.max(0, Math.min(100, Math.round(value)));

export class SettingsStore {
  constructor(
    private readonly storage: KeyValueStore,
    private readonly key: string = SETTINGS_KEY
  ) {}

  /**
   * Restores the saved bundle. Absent or mistyped fields take their defaults;
   * the volume may be stored as a number or a numeric string.
   */
  load(): DriveSettings {
    const settings: DriveSettings = { ...DEFAULT_SETTINGS };
    const raw = this.storage.getItem(this.key);
    if (!raw) return settings;

    let stored: unknown;
    try {
      stored = JSON.parse(raw);
    } catch (error) {
      console.warn('Stored drive settings are corrupt; using defaults.', error);
      return settings;
    }
    if (typeof stored !== 'object' || stored === null) return settings;

    for (const field of BOOLEAN_FIELDS) {
      const value: unknown = Reflect.get(stored, field);
      if (typeof value === 'boolean') settings[field] = value;
    }

    const rawVol: unknown = Reflect.get(stored, 'vol');
    const vol = typeof rawVol === 'number' || (typeof rawVol === 'string' && rawVol.trim()) ? Number(rawVol) : NaN;
    if (Number.isFinite(vol)) settings.vol = clampVolume(vol);

    return settings;
  }

  save(settings: DriveSettings): void {
    this.storage.setItem(this.key, JSON.stringify({ ...settings, vol: clampVolume(settings.vol) }));
  }

  /** Drops the stored bundle and hands back the defaults to apply right away. */
  reset(): DriveSettings {
    this.storage.removeItem(this.key);
    return { ...DEFAULT_SETTINGS };
  }
}
