import { loadConfig, parseConfig } from '../index';
import { ConfigurationError } from '../../errors';

function issuesOf(load: () => unknown): string[] {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('should fall back to defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.confidenceThreshold).toBe(0.35);
    expect(config.frameWidth).toBe(640);
    expect(config.frameHeight).toBe(360);
    expect(config.classFilter).toBeUndefined();
    expect(config.location).toBeUndefined();
    expect(config.tracker).toEqual({ minHits: 3, maxAge: 30, iouThreshold: 0.3 });
    expect(config.counter).toEqual({
      axis: 'x',
      lineRatio: 0.5,
      minDistance: 15,
      cooldownMs: 5000,
      historySize: 15,
      countDirection: 'both'
    });
    expect(config.scheduler).toEqual({
      suspendMs: 300_000,
      pollIntervalMs: 30_000,
      readRetryMs: 100,
      maxReadFailures: 10,
      maxRetries: 5,
      backoffBase: 2,
      maxBackoffMs: 60_000
    });
  });

  it('should read COUNTER_ environment variables', () => {
    const config = loadConfig({
      COUNTER_CLASS_FILTER: 'boat',
      COUNTER_MIN_HITS: '5',
      COUNTER_LINE_AXIS: 'y',
      COUNTER_LINE_POSITION: '200',
      COUNTER_COUNT_DIRECTION: 'top-to-bottom',
      COUNTER_LATITUDE: '38.833',
      COUNTER_LONGITUDE: '-104.821',
      COUNTER_TIMEZONE: 'America/Denver',
      COUNTER_USE_TWILIGHT: 'false'
    });

    expect(config.classFilter).toBe('boat');
    expect(config.tracker.minHits).toBe(5);
    expect(config.counter.axis).toBe('y');
    expect(config.counter.linePosition).toBe(200);
    expect(config.counter.countDirection).toBe('top-to-bottom');
    expect(config.location).toEqual({
      latitude: 38.833,
      longitude: -104.821,
      timeZone: 'America/Denver',
      useTwilight: false
    });
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig({ COUNTER_MIN_HITS: '5', COUNTER_MAX_AGE: '10' }, { tracker: { minHits: 2 } });

    expect(config.tracker).toEqual({ minHits: 2, maxAge: 10, iouThreshold: 0.3 });
  });

  it('should ignore blank variables', () => {
    expect(loadConfig({ COUNTER_MAX_AGE: '  ', COUNTER_CLASS_FILTER: '' }).tracker.maxAge).toBe(30);
  });

  it('should reject values that are not numbers', () => {
    expect(() => loadConfig({ COUNTER_COOLDOWN_MS: 'soon' })).toThrow(
      'Invalid configuration: COUNTER_COOLDOWN_MS: expected a number, got "soon"'
    );
  });

  it('should reject values that are not booleans', () => {
    expect(issuesOf(() => loadConfig({ COUNTER_LATITUDE: '10', COUNTER_USE_TWILIGHT: 'maybe' }))).toEqual([
      'COUNTER_USE_TWILIGHT: expected true or false, got "maybe"'
    ]);
  });

  it('should reject a line outside the frame', () => {
    expect(issuesOf(() => loadConfig({ COUNTER_LINE_POSITION: '700' }))).toEqual([
      'counter.linePosition: linePosition must lie inside the frame'
    ]);
  });

  it('should reject an unknown time zone', () => {
    expect(
      issuesOf(() =>
        loadConfig({ COUNTER_LATITUDE: '38.833', COUNTER_LONGITUDE: '-104.821', COUNTER_TIMEZONE: 'Mars/Olympus' })
      )
    ).toEqual(['location.timeZone: Unknown time zone "Mars/Olympus"']);
  });

  it('should require a complete location', () => {
    expect(issuesOf(() => loadConfig({ COUNTER_LATITUDE: '38.833', COUNTER_TIMEZONE: 'America/Denver' }))).toEqual([
      'location.longitude: Required'
    ]);
  });
});

describe('parseConfig', () => {
  it('should report every invalid field', () => {
    expect(issuesOf(() => parseConfig({ tracker: { iouThreshold: 1.5 }, counter: { historySize: 1 } }))).toEqual([
      'tracker.iouThreshold: Number must be less than or equal to 1',
      'counter.historySize: Number must be greater than or equal to 2'
    ]);
  });
});
