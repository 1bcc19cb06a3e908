/**
 * Core domain types for the libra log event model.
 *
 * An event is one append-only row written by a weight scale. These types
 * carry no framework dependencies.
 */

/** Actions that mark a state transition on the scale. */
export const PRIORITY_ACTIONS = ['Served', 'Refilled'] as const;

export type PriorityAction = (typeof PRIORITY_ACTIONS)[number];

/**
 * Open enumeration: `Heartbeat`, `Starting`, `Offline` and anything a
 * device firmware may add are all ordinary actions.
 */
export type ScaleAction = PriorityAction | 'Heartbeat' | 'Starting' | 'Offline' | (string & {});

/**
 * Canonical event entity.
 *
 * `sequence` is assigned by the store on insert and is the only
 * trustworthy ordering key. `timestamp` is whatever the device reported.
 */
export interface ScaleEvent {
  readonly sequence: number;
  readonly device_id: string;
  readonly model: string;
  readonly timestamp: string;
  readonly action: ScaleAction;
  readonly amount: number;
  readonly location: string;
  readonly ingredient: string;
  readonly synced: boolean;
}

/** An event as handed to the store, before a sequence is assigned. */
export type NewScaleEvent = Omit<ScaleEvent, 'sequence'>;

const priorityActions: readonly string[] = PRIORITY_ACTIONS;

export function isPriorityAction(action: string): action is PriorityAction {
  return priorityActions.includes(action);
}
