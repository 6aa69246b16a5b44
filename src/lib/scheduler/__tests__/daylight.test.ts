import { alwaysDaytime, createSunDaylightPredicate, localDateKey, solarNoon, sunWindow } from '../daylight';
import { createLogger } from '../../../test-utils';
import { GeoLocation } from '../../../types';

const coloradoSprings: GeoLocation = { latitude: 38.833, longitude: -104.821, timeZone: 'America/Denver' };
const reykjavik: GeoLocation = { latitude: 64.15, longitude: -21.94, timeZone: 'Atlantic/Reykjavik' };
const tromso: GeoLocation = { latitude: 69.65, longitude: 18.96, timeZone: 'Europe/Oslo' };
const longyearbyen: GeoLocation = { latitude: 78.22, longitude: 15.65, timeZone: 'Arctic/Longyearbyen' };

describe('localDateKey', () => {
  it('should use the calendar date of the given time zone', () => {
    const instant = new Date('2025-06-22T03:00:00.000Z');

    expect(localDateKey(instant, 'America/Denver')).toBe('2025-06-21');
    expect(localDateKey(instant, 'UTC')).toBe('2025-06-22');
  });
});

describe('solarNoon', () => {
  it('should shift noon UTC by the longitude', () => {
    const noon = solarNoon('2025-06-21', -104.821);

    expect(Math.abs(noon.getTime() - Date.parse('2025-06-21T18:59:17.040Z'))).toBeLessThanOrEqual(1);
  });
});

describe('createSunDaylightPredicate', () => {
  it('should be daytime at local noon and night in the small hours', () => {
    const isDaytime = createSunDaylightPredicate(coloradoSprings, { logger: createLogger() });

    expect(isDaytime(new Date('2025-06-21T18:00:00.000Z'))).toBe(true);
    expect(isDaytime(new Date('2025-06-21T09:00:00.000Z'))).toBe(false);
    expect(isDaytime(new Date('2025-12-21T04:00:00.000Z'))).toBe(false);
  });

  it('should count civil twilight as daytime only when asked to', () => {
    // 20:45 local, between sunset and dusk
    const evening = new Date('2025-06-22T02:45:00.000Z');

    expect(createSunDaylightPredicate(coloradoSprings, { logger: createLogger() })(evening)).toBe(true);
    expect(createSunDaylightPredicate(coloradoSprings, { useTwilight: false, logger: createLogger() })(evening)).toBe(false);
  });

  it('should compute the sun window once per local day', () => {
    const logger = createLogger();
    const isDaytime = createSunDaylightPredicate(coloradoSprings, { logger });

    isDaytime(new Date('2025-06-21T16:00:00.000Z'));
    isDaytime(new Date('2025-06-21T20:00:00.000Z'));
    expect(logger.debug).toHaveBeenCalledTimes(1);

    isDaytime(new Date('2025-06-22T16:00:00.000Z'));
    expect(logger.debug).toHaveBeenCalledTimes(2);
  });
});

describe('high latitudes', () => {
  it('should treat a night that never gets past civil twilight as daytime', () => {
    const logger = createLogger();
    const isDaytime = createSunDaylightPredicate(reykjavik, { logger });

    expect(isDaytime(new Date('2025-06-21T00:30:00.000Z'))).toBe(true);
    expect(isDaytime(new Date('2025-06-21T12:00:00.000Z'))).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith('[Daylight] window for 2025-06-21: daylight all day');
  });

  it('should still use sunrise and sunset where the sun does set', () => {
    const isDaytime = createSunDaylightPredicate(reykjavik, { useTwilight: false, logger: createLogger() });

    expect(isDaytime(new Date('2025-06-21T01:30:00.000Z'))).toBe(false);
    expect(isDaytime(new Date('2025-06-21T12:00:00.000Z'))).toBe(true);
  });

  it('should be daytime around the clock under the midnight sun', () => {
    const isDaytime = createSunDaylightPredicate(tromso, { useTwilight: false, logger: createLogger() });

    // 01:30 and 14:00 local time on June 21
    expect(isDaytime(new Date('2025-06-20T23:30:00.000Z'))).toBe(true);
    expect(isDaytime(new Date('2025-06-21T12:00:00.000Z'))).toBe(true);
    expect(sunWindow(solarNoon('2025-06-21', tromso.longitude), tromso, false)).toEqual({
      kind: 'constant',
      daytime: true
    });
  });

  it('should be night all day during the polar night', () => {
    const logger = createLogger();
    const sunriseToSunset = createSunDaylightPredicate(tromso, { useTwilight: false, logger });

    expect(sunriseToSunset(new Date('2025-12-21T10:45:00.000Z'))).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith('[Daylight] window for 2025-12-21: dark all day');
  });

  it('should keep the midday twilight of the polar night when counting twilight', () => {
    const isDaytime = createSunDaylightPredicate(tromso, { logger: createLogger() });

    expect(isDaytime(new Date('2025-12-21T10:45:00.000Z'))).toBe(true);
    expect(isDaytime(new Date('2025-12-21T14:00:00.000Z'))).toBe(false);
  });

  it('should be night all day where even twilight never comes', () => {
    const isDaytime = createSunDaylightPredicate(longyearbyen, { logger: createLogger() });

    expect(isDaytime(new Date('2025-12-21T11:00:00.000Z'))).toBe(false);
  });
});

describe('alwaysDaytime', () => {
  it('should never report night', () => {
    expect(alwaysDaytime(new Date('2025-12-21T04:00:00.000Z'))).toBe(true);
  });
});
