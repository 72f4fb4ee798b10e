import { describe, it, expect } from 'vitest';
import {
  ColorClassifier,
  DEFAULT_THRESHOLDS,
  bandColor,
  createThresholdConfig,
  isBandName,
  validateThresholdTable,
  type ThresholdBand,
} from '../../src/core/classifier.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('ColorClassifier', () => {
  const classifier = new ColorClassifier();

  describe('temperature', () => {
    it('classifies each band', () => {
      expect(classifier.classify('temperature', 10)).toBe('cold-blue');
      expect(classifier.classify('temperature', 45)).toBe('cool-cyan');
      expect(classifier.classify('temperature', 70)).toBe('comfortable-green');
      expect(classifier.classify('temperature', 76)).toBe('warm-yellow');
      expect(classifier.classify('temperature', 101)).toBe('hot-red');
    });

    it('puts boundary values in the lower band', () => {
      expect(classifier.classify('temperature', 32)).toBe('cold-blue');
      expect(classifier.classify('temperature', 32.1)).toBe('cool-cyan');
      expect(classifier.classify('temperature', 90)).toBe('warm-yellow');
    });

    it('covers extreme values', () => {
      expect(classifier.classify('temperature', -60)).toBe('cold-blue');
      expect(classifier.classify('temperature', 1e9)).toBe('hot-red');
    });

    it('uses the same bands for feels-like', () => {
      expect(classifier.classify('feels-like', 95)).toBe('hot-red');
    });
  });

  it('classifies humidity', () => {
    expect(classifier.classify('humidity', 30)).toBe('dry-yellow');
    expect(classifier.classify('humidity', 45)).toBe('comfortable-green');
    expect(classifier.classify('humidity', 85)).toBe('humid-cyan');
  });

  it('classifies wind speed', () => {
    expect(classifier.classify('wind-speed', 0)).toBe('calm-green');
    expect(classifier.classify('wind-speed', 10)).toBe('calm-green');
    expect(classifier.classify('wind-speed', 18)).toBe('moderate-yellow');
    expect(classifier.classify('wind-speed', 40)).toBe('strong-red');
  });

  it('classifies pressure', () => {
    expect(classifier.classify('pressure', 29.5)).toBe('low-yellow');
    expect(classifier.classify('pressure', 30.2)).toBe('normal-green');
    expect(classifier.classify('pressure', 30.45)).toBe('high-cyan');
  });

  it('returns unknown for missing values', () => {
    expect(classifier.classify('temperature', null)).toBe('unknown');
    expect(classifier.classify('humidity', NaN)).toBe('unknown');
  });

  it('accepts custom thresholds', () => {
    const custom = new ColorClassifier(
      createThresholdConfig({
        humidity: [
          { upTo: 40, band: 'dry-yellow' },
          { upTo: Infinity, band: 'humid-cyan' },
        ],
      })
    );

    expect(custom.classify('humidity', 40)).toBe('dry-yellow');
    expect(custom.classify('humidity', 41)).toBe('humid-cyan');
    expect(custom.classify('temperature', 76)).toBe('warm-yellow');
  });

  it('ignores changes to its thresholds after construction', () => {
    const temperature: ThresholdBand[] = [
      { upTo: 32, band: 'cold-blue' },
      { upTo: Infinity, band: 'hot-red' },
    ];
    const custom = new ColorClassifier({ ...DEFAULT_THRESHOLDS, temperature });

    temperature[0] = { upTo: 100, band: 'warm-yellow' };
    temperature.unshift({ upTo: 200, band: 'very-hot-red' });

    expect(custom.classify('temperature', 20)).toBe('cold-blue');
    expect(custom.classify('temperature', 50)).toBe('hot-red');
  });
});

describe('DEFAULT_THRESHOLDS', () => {
  it('is frozen all the way down', () => {
    expect(Object.isFrozen(DEFAULT_THRESHOLDS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_THRESHOLDS.temperature)).toBe(true);
    expect(Object.isFrozen(DEFAULT_THRESHOLDS.temperature[0])).toBe(true);
    expect(Object.isFrozen(DEFAULT_THRESHOLDS['feels-like'])).toBe(true);
    expect(Object.isFrozen(DEFAULT_THRESHOLDS.humidity[0])).toBe(true);
  });

  it('cannot be changed through a writable view', () => {
    const tables: Record<string, unknown> = DEFAULT_THRESHOLDS;
    expect(() => {
      tables.temperature = [];
    }).toThrow(TypeError);
    expect(new ColorClassifier().classify('temperature', 10)).toBe('cold-blue');
  });
});

describe('validateThresholdTable', () => {
  it('accepts every default table', () => {
    for (const [metric, table] of Object.entries(DEFAULT_THRESHOLDS)) {
      expect(() => validateThresholdTable(metric, table)).not.toThrow();
    }
  });

  it('rejects an empty table', () => {
    expect(() => validateThresholdTable('humidity', [])).toThrow('Threshold table for humidity is empty');
  });

  it('rejects bounds that do not increase', () => {
    expect(() =>
      validateThresholdTable('humidity', [
        { upTo: 50, band: 'dry-yellow' },
        { upTo: 40, band: 'comfortable-green' },
        { upTo: Infinity, band: 'humid-cyan' },
      ])
    ).toThrow('Threshold bounds for humidity overlap: 40 does not exceed 50');
  });

  it('rejects a table with a finite top bound', () => {
    expect(() =>
      validateThresholdTable('wind-speed', [
        { upTo: 10, band: 'calm-green' },
        { upTo: 25, band: 'moderate-yellow' },
      ])
    ).toThrow('Threshold table for wind-speed leaves values above 25 uncovered');
  });

  it('rejects a NaN bound', () => {
    expect(() =>
      validateThresholdTable('pressure', [{ upTo: NaN, band: 'low-yellow' }])
    ).toThrow(ConfigurationError);
  });
});

describe('createThresholdConfig', () => {
  it('returns the defaults without overrides', () => {
    const config = createThresholdConfig();
    expect(config.temperature).toEqual(DEFAULT_THRESHOLDS.temperature);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.humidity)).toBe(true);
  });

  it('copies override tables', () => {
    const humidity: ThresholdBand[] = [
      { upTo: 40, band: 'dry-yellow' },
      { upTo: Infinity, band: 'humid-cyan' },
    ];
    const config = createThresholdConfig({ humidity });

    humidity.splice(0, 1);

    expect(config.humidity).toEqual([
      { upTo: 40, band: 'dry-yellow' },
      { upTo: Infinity, band: 'humid-cyan' },
    ]);
    expect(new ColorClassifier(config).classify('humidity', 35)).toBe('dry-yellow');
  });

  it('rejects unknown metrics', () => {
    expect(() =>
      createThresholdConfig({ rainfall: [{ upTo: Infinity, band: 'wet-blue' }] })
    ).toThrow('Unknown metric in thresholds: rainfall');
  });

  it('validates override tables', () => {
    expect(() => createThresholdConfig({ temperature: [] })).toThrow(ConfigurationError);
  });
});

describe('band helpers', () => {
  it('maps bands to colors', () => {
    expect(bandColor('cold-blue')).toBe('blue');
    expect(bandColor('comfortable-green')).toBe('green');
    expect(bandColor('unknown')).toBe('white');
  });

  it('recognizes band names', () => {
    expect(isBandName('warm-yellow')).toBe(true);
    expect(isBandName('very-hot-red')).toBe(true);
    expect(isBandName('warm')).toBe(false);
    expect(isBandName('-red')).toBe(false);
    expect(isBandName('warm-purple')).toBe(false);
  });
});
