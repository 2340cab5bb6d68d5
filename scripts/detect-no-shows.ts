/**
 * No-Show Detection Script
 *
 * Marks CONFIRMED appointments as NO_SHOW when:
 * - Current time > startTime + NO_SHOW_GRACE_MINUTES (default: 10)
 *
 * Assigned staff on those appointments are released. Safe to run multiple
 * times (idempotent).
 *
 * Usage: npm run detect-no-shows
 */

// Loads .env before any other module reads process.env
import { loadDatabaseEnv } from '../src/config/env';
import { closeDbPool, getDbPool } from '../src/config/database';
import { loadSchedulingConfig } from '../src/config/scheduling';
import { logger } from '../src/lib/logger';
import { SchedulingFacade } from '../src/services/scheduling.facade';
import { PgSchedulingStore } from '../src/store/pg.store';

async function main() {
  const env = loadDatabaseEnv();
  const config = loadSchedulingConfig();
  const facade = new SchedulingFacade(PgSchedulingStore.fromPool(getDbPool(env.DATABASE_URL), logger), {
    config,
    logger,
  });

  console.log('No-Show Detection Script');
  console.log('='.repeat(50));
  console.log(`Grace period: ${config.noShowGraceMinutes} minutes after start time`);
  console.log(`Current time: ${new Date().toISOString()}`);
  console.log('');

  const result = await facade.detectNoShows();
  if (!result.success) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }

  console.log('Results:');
  console.log(`  Appointments scanned: ${result.data.scanned}`);
  console.log(`  Marked as NO_SHOW:    ${result.data.markedAsNoShow}`);

  if (result.data.details.length > 0) {
    console.log('');
    console.log('Details:');
    for (const detail of result.data.details) {
      console.log(`  - Appointment: ${detail.appointmentId}`);
      console.log(`    Customer:    ${detail.customerId}`);
    }
  }

  if (result.data.failures.length > 0) {
    console.log('');
    console.log('Failures:');
    for (const failed of result.data.failures) {
      console.log(`  - Appointment: ${failed.appointmentId}: ${failed.error}`);
    }
  }

  console.log('');
  console.log('='.repeat(50));
  console.log('Done.');

  await closeDbPool();
}

main().catch(async (error) => {
  console.error('Error:', error);
  await closeDbPool();
  process.exit(1);
});
