import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CATALOG_PATH,
  ReadingGenerator,
  loadGeneratorCatalog,
} from '../../src/application/reading-generator.js';
import type { Random } from '../../src/application/reading-generator.js';

const catalog = loadGeneratorCatalog();
const NOW = new Date('2026-03-02T10:00:00.000Z');

/** Returns the given values in order, then repeats the last one. */
function sequence(...values: number[]): Random {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

function generatorWith(random: Random): ReadingGenerator {
  return new ReadingGenerator(catalog, random, () => NOW);
}

const TMP_DIR = join(process.cwd(), '.tmp-test-catalog');

describe('loadGeneratorCatalog', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('looks for the catalogue under config/ in the working directory', () => {
    expect(DEFAULT_CATALOG_PATH).toBe(join(process.cwd(), 'config', 'generator-catalog.json'));
    expect(loadGeneratorCatalog(DEFAULT_CATALOG_PATH).models).toHaveLength(3);
  });

  it('rejects a catalogue whose ranges are inverted', () => {
    mkdirSync(TMP_DIR, { recursive: true });
    const path = join(TMP_DIR, 'catalog.json');
    writeFileSync(path, JSON.stringify({
      models: ['M'],
      scale_numbers: ['S'],
      locations: ['L'],
      ingredients: [{ name: 'Salt', min_grams: 50, max_grams: 5 }],
    }), 'utf-8');

    expect(() => loadGeneratorCatalog(path)).toThrow('min_grams must not exceed max_grams');
  });

  it('loads the bundled catalogue', () => {
    expect(catalog.models).toEqual(['LibraV0', 'LibraV1', 'LibraV2']);
    expect(catalog.scale_numbers).toHaveLength(4);
    expect(catalog.locations).toHaveLength(8);
    expect(catalog.ingredients).toHaveLength(20);
    expect(catalog.ingredients[0]).toEqual({ name: 'Flour', min_grams: 100, max_grams: 5000 });
  });
});

describe('ReadingGenerator', () => {
  describe('reading', () => {
    it('builds a full reading from the catalogue', () => {
      const reading = generatorWith(() => 0).reading();

      expect(reading).toEqual({
        model: 'LibraV0',
        device_id: '716710-0-0',
        timestamp: '2026-03-02T10:00:00.000Z',
        action: 'Heartbeat',
        amount: 100,
        location: 'Kitchen Counter',
        ingredient: 'Flour',
        synced: true,
      });
    });

    it('weights actions towards heartbeats', () => {
      expect(generatorWith(sequence(0.5, 0)).reading().action).toBe('Heartbeat');
      expect(generatorWith(sequence(0.85, 0)).reading().action).toBe('Refilled');
      expect(generatorWith(sequence(0.95, 0)).reading().action).toBe('Served');
    });

    it('keeps amounts inside the ingredient range', () => {
      const reading = generatorWith(() => 0.5).reading({ ingredient: 'Salt' });

      expect(reading.amount).toBe(252.5);
    });

    it('may report an empty pan on power transitions', () => {
      const reading = generatorWith(() => 0).reading({ action: 'Starting' });

      expect(reading.amount).toBe(0);
    });

    it('rounds amounts to two decimals', () => {
      const reading = generatorWith(() => 0).reading({ amount: 12.3456 });

      expect(reading.amount).toBe(12.35);
    });
  });

  describe('batch', () => {
    it('spreads timestamps over the last hour and sorts them', () => {
      const random = sequence(
        0.9, 0, 0, 0, 0, 0, 0, 0,
        0.1, 0, 0, 0, 0, 0, 0, 0,
      );

      const readings = generatorWith(random).batch(2);

      expect(readings.map((r) => r.timestamp)).toEqual([
        '2026-03-02T09:06:00.000Z',
        '2026-03-02T09:54:00.000Z',
      ]);
    });
  });

  describe('scenario', () => {
    it('walks from Starting through heartbeats to Offline', () => {
      const generator = generatorWith(() => 0.5);
      const ctx = generator.scenario();

      expect(ctx).toEqual({
        device_id: '716710-2',
        ingredient: 'Olive Oil',
        location: 'Loading Dock',
        target_grams: 525,
      });

      const start = generator.scenarioStart(ctx);
      const halfway = generator.scenarioProgress(ctx, 0.5);
      const end = generator.scenarioEnd(ctx);

      expect([start.action, halfway.action, end.action]).toEqual(['Starting', 'Heartbeat', 'Offline']);
      expect([start.amount, halfway.amount, end.amount]).toEqual([0, 262.5, 525]);
      expect(new Set([start.device_id, halfway.device_id, end.device_id])).toEqual(new Set(['716710-2']));
    });

    it('adds up to 5 % noise and never goes negative', () => {
      const generator = generatorWith(() => 0);
      const ctx = generator.scenario({ device_id: 'X', ingredient: 'Flour', location: 'Quality Lab' });

      expect(ctx.target_grams).toBe(100);
      expect(generator.scenarioProgress(ctx, 0.5).amount).toBe(45);
      expect(generator.scenarioProgress(ctx, 0).amount).toBe(0);
    });
  });
});
