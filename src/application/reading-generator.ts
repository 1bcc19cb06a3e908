import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { NewScaleEvent } from '../domain/index.js';
import { generatorCatalogSchema } from './event-schema.js';
import type { GeneratorCatalog } from './event-schema.js';

/** Uniform random source in [0, 1). */
export type Random = () => number;

/** Heartbeats dominate real traffic; the two state transitions share the rest. */
export const ACTION_WEIGHTS: ReadonlyArray<readonly [string, number]> = [
  ['Heartbeat', 80],
  ['Refilled', 10],
  ['Served', 10],
];

/** Relative to the working directory, like the rest of the runtime config. */
export const DEFAULT_CATALOG_PATH = resolve(process.cwd(), 'config/generator-catalog.json');

export interface ReadingOverrides {
  timestamp?: string;
  action?: string;
  ingredient?: string;
  location?: string;
  device_id?: string;
  amount?: number;
}

/** Fixed attributes of one simulated weighing session. */
export interface ScenarioContext {
  device_id: string;
  ingredient: string;
  location: string;
  target_grams: number;
}

/**
 * Loads and validates the generator catalogue.
 * Throws a ZodError when the file does not match the schema.
 */
export function loadGeneratorCatalog(path: string = DEFAULT_CATALOG_PATH): GeneratorCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return generatorCatalogSchema.parse(raw);
}

/**
 * Produces plausible scale readings for development and demos.
 *
 * Randomness and the clock are injected so sequences are reproducible.
 */
export class ReadingGenerator {
  constructor(
    private readonly catalog: GeneratorCatalog,
    private readonly random: Random = Math.random,
    private readonly now: () => Date = () => new Date(),
  ) {}

  reading(overrides: ReadingOverrides = {}): NewScaleEvent {
    const action = overrides.action ?? this.pickAction();
    const ingredient = overrides.ingredient ?? this.pick(this.catalog.ingredients).name;
    const location = overrides.location ?? this.pick(this.catalog.locations);

    let amount = overrides.amount;
    if (amount === undefined) {
      // Power transitions sometimes report an empty pan.
      const empty = (action === 'Starting' || action === 'Offline') && this.random() < 0.3;
      amount = empty ? 0 : this.uniformFor(ingredient);
    }

    return {
      model: this.pick(this.catalog.models),
      device_id: overrides.device_id ?? this.pick(this.catalog.scale_numbers),
      timestamp: overrides.timestamp ?? this.now().toISOString(),
      action,
      amount: round2(amount),
      location,
      ingredient,
      synced: this.random() < 0.5,
    };
  }

  /**
   * `count` readings with timestamps spread over the `spreadHours` before
   * now, sorted by timestamp.
   */
  batch(count: number, spreadHours = 1): NewScaleEvent[] {
    const spreadMs = spreadHours * 3_600_000;
    const start = this.now().getTime() - spreadMs;

    const readings: NewScaleEvent[] = [];
    for (let i = 0; i < count; i++) {
      const timestamp = new Date(start + this.random() * spreadMs).toISOString();
      readings.push(this.reading({ timestamp }));
    }

    return readings.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  /** Picks the scale, ingredient, location and target weight of a session. */
  scenario(fixed: Partial<Omit<ScenarioContext, 'target_grams'>> = {}): ScenarioContext {
    const device_id = fixed.device_id ?? this.pick(this.catalog.scale_numbers);
    const ingredient = fixed.ingredient ?? this.pick(this.catalog.ingredients).name;
    const location = fixed.location ?? this.pick(this.catalog.locations);
    return { device_id, ingredient, location, target_grams: this.uniformFor(ingredient) };
  }

  scenarioStart(ctx: ScenarioContext): NewScaleEvent {
    return this.reading({ ...this.scenarioFields(ctx), action: 'Starting', amount: 0 });
  }

  /** A heartbeat at `progress` (0..1) of the way to the target, ±5 % noise. */
  scenarioProgress(ctx: ScenarioContext, progress: number): NewScaleEvent {
    const noise = (this.random() * 2 - 1) * ctx.target_grams * 0.05;
    const amount = Math.max(0, ctx.target_grams * progress + noise);
    return this.reading({ ...this.scenarioFields(ctx), action: 'Heartbeat', amount });
  }

  scenarioEnd(ctx: ScenarioContext): NewScaleEvent {
    return this.reading({ ...this.scenarioFields(ctx), action: 'Offline', amount: ctx.target_grams });
  }

  /** Random integer in [min, max]. */
  int(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  private scenarioFields(ctx: ScenarioContext): ReadingOverrides {
    return { device_id: ctx.device_id, ingredient: ctx.ingredient, location: ctx.location };
  }

  private uniformFor(ingredient: string): number {
    const entry = this.catalog.ingredients.find((i) => i.name === ingredient);
    const min = entry?.min_grams ?? 10;
    const max = entry?.max_grams ?? 1000;
    return this.uniform(min, max);
  }

  private pickAction(): string {
    const total = ACTION_WEIGHTS.reduce((sum, [, weight]) => sum + weight, 0);
    let r = this.random() * total;
    for (const [action, weight] of ACTION_WEIGHTS) {
      if (r < weight) return action;
      r -= weight;
    }
    return 'Heartbeat';
  }

  private pick<T>(items: readonly T[]): T {
    const item = items[Math.min(Math.floor(this.random() * items.length), items.length - 1)];
    if (item === undefined) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return item;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
