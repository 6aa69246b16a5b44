import { getPosition, getTimes } from 'suncalc';
import { DaylightPredicate, GeoLocation, Logger } from '../../types';
import { consoleLogger } from '../runtime';

export interface DaylightOptions {
  /** Count civil twilight (dawn to dusk) as daytime; otherwise sunrise to sunset. */
  useTwilight?: boolean;
  logger?: Logger;
}

/**
 * Daylight bounds of one day. Near the poles the sun may stay above or below
 * the threshold all day, and there are no bounds.
 */
export type SunWindow =
  | { kind: 'bounded'; start: Date; end: Date }
  | { kind: 'constant'; daytime: boolean };

// Sun altitudes in degrees, as suncalc defines its events
const SUNRISE_ALTITUDE = -0.833;
const CIVIL_DAWN_ALTITUDE = -6;

/**
 * Calendar date of `date` in an IANA time zone, as YYYY-MM-DD.
 */
export function localDateKey(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).format(date);
}

/**
 * Approximate solar noon (UTC) of a YYYY-MM-DD day at a longitude.
 */
export function solarNoon(day: string, longitude: number): Date {
  const [year, month, date] = day.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, date, 12) - (longitude / 15) * 3_600_000);
}

export function sunWindow(date: Date, location: GeoLocation, useTwilight: boolean): SunWindow {
  const { latitude, longitude } = location;
  const times = getTimes(date, latitude, longitude);
  const [start, end] = useTwilight ? [times.dawn, times.dusk] : [times.sunrise, times.sunset];
  if (isValidDate(start) && isValidDate(end)) {
    return { kind: 'bounded', start, end };
  }

  const noonAltitude = (getPosition(times.solarNoon, latitude, longitude).altitude * 180) / Math.PI;
  return { kind: 'constant', daytime: noonAltitude > (useTwilight ? CIVIL_DAWN_ALTITUDE : SUNRISE_ALTITUDE) };
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function describeWindow(window: SunWindow): string {
  if (window.kind === 'constant') {
    return window.daytime ? 'daylight all day' : 'dark all day';
  }
  return `${window.start.toISOString()} - ${window.end.toISOString()}`;
}

/**
 * Daylight predicate from sun events at a fixed location. The window is
 * computed once per local calendar day.
 */
export function createSunDaylightPredicate(location: GeoLocation, options: DaylightOptions = {}): DaylightPredicate {
  const useTwilight = options.useTwilight ?? true;
  const logger = options.logger ?? consoleLogger;
  let cached: { day: string; window: SunWindow } | null = null;

  return (timestamp: Date) => {
    const day = localDateKey(timestamp, location.timeZone);
    if (!cached || cached.day !== day) {
      cached = { day, window: sunWindow(solarNoon(day, location.longitude), location, useTwilight) };
      logger.debug(`[Daylight] window for ${day}: ${describeWindow(cached.window)}`);
    }
    const { window } = cached;
    if (window.kind === 'constant') {
      return window.daytime;
    }
    const t = timestamp.getTime();
    return window.start.getTime() <= t && t <= window.end.getTime();
  };
}

export const alwaysDaytime: DaylightPredicate = () => true;
