import type { AppRoutes } from '../config';
import type { DashboardUser, ModeFilter, Street } from '../types';

export const MAX_MAP_POINTS = 400;

export function formatCount(value: unknown): string {
  const n = Number(value || 0);
  return (Number.isFinite(n) ? n : 0).toLocaleString();
}

export function formatPlace(city?: string, country?: string): string {
  return `${city || ''}${city && country ? ', ' : ''}${country || ''}`;
}

export const modeOf = (street: { mode?: string }): string => (street.mode || 'walk').toLowerCase();

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/** `2024-01-05` → `Jan 05`. Anything that does not parse comes back untouched. */
export function formatChartLabel(label: string, locale?: string): string {
  const match = ISO_DATE.exec(String(label));
  if (!match) return label;
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (Number.isNaN(date.getTime())) return label;
  try {
    return date.toLocaleDateString(locale, { month: 'short', day: '2-digit', timeZone: 'UTC' });
  } catch {
    return label;
  }
}

export function sumSeries(data: unknown[] | undefined): number {
  return (data || []).reduce<number>((total, value) => total + (Number(value) || 0), 0);
}

/**
 * Narrows the full collection by mode and a case-insensitive substring query over
 * name, city, country, type and mode. Always call with the complete collection.
 */
export function filterStreets(streets: readonly Street[], query: string, mode: ModeFilter | string): Street[] {
  const q = (query || '').trim().toLowerCase();
  const wanted = (mode || 'all').toLowerCase();

  return streets.filter(street => {
    if (wanted !== 'all' && String(street.mode || '').toLowerCase() !== wanted) return false;
    if (!q) return true;
    const haystack = [street.name || '', street.city || '', street.country || '', street.type || '', street.mode || '']
      .join(' ')
      .toLowerCase();
    return haystack.includes(q);
  });
}

export function buildWorldUrl(street: Street, routes: AppRoutes): string {
  const type = (street.type || '').toLowerCase();
  const query = `?street_id=${encodeURIComponent(street._id)}`;

  if (type === '3d') return `${routes.world3d}${query}`;

  switch (modeOf(street)) {
    case 'drive':
      return `${routes.worldDrive}${query}`;
    case 'fly':
      return `${routes.worldFly}${query}`;
    case 'sit':
      return `${routes.worldSit}${query}`;
    default:
      return `${routes.worldBase}${query}`;
  }
}

export const buildDeleteUrl = (id: string): string => `/street/${encodeURIComponent(id)}/delete`;

export type PlottableStreet = Street & { lat: number; lng: number };

export const isPlottable = (street: Street): street is PlottableStreet =>
  typeof street.lat === 'number' &&
  typeof street.lng === 'number' &&
  Number.isFinite(street.lat) &&
  Number.isFinite(street.lng);

export function plottableStreets(streets: readonly Street[] | undefined, limit = MAX_MAP_POINTS): PlottableStreet[] {
  return (streets || []).filter(isPlottable).slice(0, limit);
}

/** Segment URLs in playback order; single-file uploads play their one video. */
export function streetSegments(street: Street | null | undefined): string[] {
  if (!street) return [];
  const urls = (street.videos || []).map(video => video?.url).filter((url): url is string => Boolean(url));
  if (urls.length) return urls;
  return street.videoUrl ? [street.videoUrl] : [];
}

export function isAdmin(user: DashboardUser | null | undefined): boolean {
  return Boolean(user?.is_admin) || String(user?.role || '').toLowerCase() === 'admin';
}

export function avatarLetter(user: DashboardUser | null | undefined): string {
  return (user?.name || user?.email || 'U').trim().slice(0, 1).toUpperCase() || 'U';
}

export function escapeHtml(value: unknown): string {
  return String(value ?? '')
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#039;');
}
