import type { Log } from './logger.js';
import type { BatchObserver } from './change-monitor.js';

/** Logs one line per new record. */
export function createLoggingObserver(log: Log): BatchObserver {
  return (batch) => {
    for (const record of batch) {
      log.info(
        { sequence: record.sequence, device_id: record.device_id, action: record.action },
        `New record: ${record.ingredient} = ${record.amount} at ${record.location}`,
      );
    }
  };
}
