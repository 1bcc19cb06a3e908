import { pino } from 'pino';
import { loadGeneratorConfig, createDbClient, ensureSchema, insertEvent } from './infrastructure/index.js';
import {
  ReadingGenerator,
  generateReadings,
  loadGeneratorCatalog,
  newEventSchema,
  sleep,
} from './application/index.js';
import type { ReadingSink } from './application/index.js';

/**
 * Standalone process that writes synthetic scale readings into `libra_logs`.
 *
 * Runs independently of the HTTP server; the server's change monitor picks
 * up whatever this process appends. Mode and pacing come from GENERATOR_*
 * environment variables.
 */
const config = loadGeneratorConfig();
const log = pino({ level: config.logLevel });

const { sql, db } = createDbClient(config.databaseUrl);

// Abort controller for graceful shutdown
const ac = new AbortController();

const sink: ReadingSink = async (reading) => {
  const parsed = newEventSchema.safeParse(reading);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues }, 'Generated reading failed validation, skipped');
    return false;
  }

  try {
    await insertEvent(db, parsed.data);
    return true;
  } catch (err: unknown) {
    log.error({ err }, 'Error inserting entry');
    return false;
  }
};

async function main(): Promise<void> {
  await ensureSchema(sql);
  log.info('Database and table ready');

  log.info({ mode: config.mode }, '=== Libra Test Data Generator ===');

  const written = await generateReadings(
    {
      mode: config.mode,
      count: config.count,
      intervalMs: config.intervalMs,
      durationMinutes: config.durationMinutes,
    },
    {
      generator: new ReadingGenerator(loadGeneratorCatalog()),
      sink,
      log,
      signal: ac.signal,
      sleep,
      clock: () => Date.now(),
    },
  );

  log.info({ written }, 'Generator finished');
}

function shutdown(): void {
  log.info('Stopping generator...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(() => sql.end())
  .catch(async (err: unknown) => {
    log.fatal({ err }, 'Generator crashed');
    await sql.end({ timeout: 1 });
    process.exit(1);
  });
