import type { Log } from './logger.js';
import type { NewScaleEvent } from '../domain/index.js';
import type { ReadingGenerator } from './reading-generator.js';

export type GeneratorMode = 'single' | 'batch' | 'continuous' | 'scenario';

/** Appends one reading; resolves false when the write failed. */
export type ReadingSink = (reading: NewScaleEvent) => Promise<boolean>;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface GenerateOptions {
  mode: GeneratorMode;
  count: number;
  intervalMs: number;
  durationMinutes: number;
  burstChance?: number;
}

export interface GenerateDeps {
  generator: ReadingGenerator;
  sink: ReadingSink;
  log: Log;
  signal: AbortSignal;
  sleep: Sleep;
  clock: () => number;
}

/**
 * Drives the generator in one of its four modes and returns the number of
 * readings written. Continuous and scenario modes stop early on abort.
 */
export async function generateReadings(
  options: GenerateOptions,
  deps: GenerateDeps,
): Promise<number> {
  switch (options.mode) {
    case 'single':
      return writeAll(deps, [deps.generator.reading()]);
    case 'batch': {
      deps.log.info({ count: options.count }, `Generating ${options.count} entries...`);
      const written = await writeAll(deps, deps.generator.batch(options.count));
      deps.log.info({ count: written }, `Generated ${written} batch entries`);
      return written;
    }
    case 'continuous':
      return runContinuous(deps, options.intervalMs, options.burstChance ?? 0.1);
    case 'scenario':
      return runScenario(deps, options.durationMinutes);
  }
}

async function write(deps: GenerateDeps, reading: NewScaleEvent): Promise<boolean> {
  const ok = await deps.sink(reading);
  if (ok) {
    deps.log.info(
      { device_id: reading.device_id, action: reading.action },
      `Added: ${reading.ingredient} = ${reading.amount}g at ${reading.location} (${reading.action})`,
    );
  }
  return ok;
}

async function writeAll(deps: GenerateDeps, readings: readonly NewScaleEvent[]): Promise<number> {
  let written = 0;
  for (const reading of readings) {
    if (await write(deps, reading)) written++;
  }
  return written;
}

async function runContinuous(deps: GenerateDeps, intervalMs: number, burstChance: number): Promise<number> {
  const { generator, log, signal } = deps;
  log.info({ intervalMs }, 'Started continuous generation');

  let written = 0;
  while (!signal.aborted) {
    if (generator.uniform(0, 1) < burstChance) {
      const burstSize = generator.int(2, 5);
      log.info({ burstSize }, `Generating burst of ${burstSize} entries`);
      for (let i = 0; i < burstSize && !signal.aborted; i++) {
        if (await write(deps, generator.reading())) written++;
        await deps.sleep(200, signal);
      }
    } else if (await write(deps, generator.reading())) {
      written++;
    }

    const jittered = intervalMs + generator.uniform(-500, 500);
    await deps.sleep(Math.max(100, jittered), signal);
  }

  log.info({ written }, 'Stopped continuous generation');
  return written;
}

async function runScenario(deps: GenerateDeps, durationMinutes: number): Promise<number> {
  const { generator, log, signal } = deps;
  const device = generator.scenario();

  log.info(
    { device_id: device.device_id, durationMinutes },
    `Starting scale scenario: ${device.ingredient} at ${device.location} for ${durationMinutes} minutes`,
  );

  let written = 0;
  if (await write(deps, generator.scenarioStart(device))) written++;

  const totalMs = durationMinutes * 60_000;
  const startedAt = deps.clock();

  while (!signal.aborted) {
    const elapsed = deps.clock() - startedAt;
    if (elapsed >= totalMs) break;

    if (await write(deps, generator.scenarioProgress(device, elapsed / totalMs))) written++;
    await deps.sleep(generator.uniform(1000, 3000), signal);
  }

  if (await write(deps, generator.scenarioEnd(device))) written++;

  log.info(
    { device_id: device.device_id, target_grams: device.target_grams },
    `Completed scale scenario: ${device.ingredient} = ${device.target_grams.toFixed(2)}g`,
  );
  return written;
}
