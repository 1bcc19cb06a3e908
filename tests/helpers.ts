import { vi } from 'vitest';
import type { Log } from '../src/application/index.js';
import type { NewScaleEvent } from '../src/domain/index.js';

/**
 * Factory for readings with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeReading(overrides: Partial<NewScaleEvent> = {}): NewScaleEvent {
  return {
    device_id: overrides.device_id ?? '716710-1',
    model: overrides.model ?? 'LibraV1',
    timestamp: overrides.timestamp ?? '2026-03-02T09:00:00.000Z',
    action: overrides.action ?? 'Heartbeat',
    amount: overrides.amount ?? 250,
    location: overrides.location ?? 'Prep Station A',
    ingredient: overrides.ingredient ?? 'Flour',
    synced: overrides.synced ?? false,
  };
}

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    level: 'info',
  };
  return log as unknown as Log & typeof log;
}
