import { describe, it, expect, vi } from 'vitest';
import { generateReadings } from '../../src/application/generate-readings.js';
import type { GenerateDeps, GenerateOptions, ReadingSink } from '../../src/application/generate-readings.js';
import { ReadingGenerator, loadGeneratorCatalog } from '../../src/application/reading-generator.js';
import type { Random } from '../../src/application/reading-generator.js';
import type { NewScaleEvent } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const catalog = loadGeneratorCatalog();

const baseOptions: GenerateOptions = {
  mode: 'single',
  count: 1,
  intervalMs: 2000,
  durationMinutes: 1,
};

function makeDeps(random: Random, overrides: Partial<GenerateDeps> = {}) {
  const written: NewScaleEvent[] = [];
  const sink = vi.fn<ReadingSink>(async (reading) => {
    written.push(reading);
    return true;
  });
  const ac = new AbortController();
  const deps: GenerateDeps = {
    generator: new ReadingGenerator(catalog, random, () => new Date('2026-03-02T10:00:00.000Z')),
    sink,
    log: fakeLogger(),
    signal: ac.signal,
    sleep: vi.fn(async () => {}),
    clock: () => 0,
    ...overrides,
  };
  return { deps, sink, written, ac };
}

describe('generateReadings', () => {
  it('single mode writes one reading', async () => {
    const { deps, sink } = makeDeps(() => 0);

    await expect(generateReadings(baseOptions, deps)).resolves.toBe(1);
    expect(sink).toHaveBeenCalledTimes(1);
  });

  it('batch mode writes `count` readings', async () => {
    const { deps, written } = makeDeps(() => 0.3);

    await expect(generateReadings({ ...baseOptions, mode: 'batch', count: 4 }, deps)).resolves.toBe(4);
    expect(written).toHaveLength(4);
  });

  it('does not count failed writes', async () => {
    const { deps } = makeDeps(() => 0);
    const failing = vi.fn<ReadingSink>(async () => false);

    const count = await generateReadings({ ...baseOptions, mode: 'batch', count: 3 }, { ...deps, sink: failing });

    expect(count).toBe(0);
    expect(failing).toHaveBeenCalledTimes(3);
  });

  it('continuous mode stops immediately when already aborted', async () => {
    const { deps, sink, ac } = makeDeps(() => 0.5);
    ac.abort();

    await expect(generateReadings({ ...baseOptions, mode: 'continuous' }, deps)).resolves.toBe(0);
    expect(sink).not.toHaveBeenCalled();
  });

  it('continuous mode writes, then waits the jittered interval', async () => {
    const ac = new AbortController();
    const sleep = vi.fn(async () => { ac.abort(); });
    const { deps, sink } = makeDeps(() => 0.5, { signal: ac.signal, sleep });

    const count = await generateReadings({ ...baseOptions, mode: 'continuous' }, deps);

    expect(count).toBe(1);
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000, ac.signal);
  });

  it('continuous mode emits bursts 200 ms apart', async () => {
    const ac = new AbortController();
    const sleep = vi.fn(async (ms: number) => {
      if (ms !== 200) ac.abort();
    });
    const { deps, sink } = makeDeps(() => 0, { signal: ac.signal, sleep });

    const count = await generateReadings({ ...baseOptions, mode: 'continuous' }, deps);

    expect(count).toBe(2);
    expect(sink).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 200, 1500]);
  });

  it('scenario mode writes Starting, heartbeats, then Offline', async () => {
    const ticks = [0, 0, 60_000];
    const clock = () => ticks.shift() ?? 60_000;
    const { deps, written } = makeDeps(() => 0.5, { clock });

    const count = await generateReadings({ ...baseOptions, mode: 'scenario', durationMinutes: 1 }, deps);

    expect(count).toBe(3);
    expect(written.map((r) => r.action)).toEqual(['Starting', 'Heartbeat', 'Offline']);
    expect(written.map((r) => r.amount)).toEqual([0, 0, 525]);
    expect(written.map((r) => r.device_id)).toEqual(['716710-2', '716710-2', '716710-2']);
  });
});
