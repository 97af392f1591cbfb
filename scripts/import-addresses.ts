/**
 * Import pre-generated TRON deposit addresses into the pool.
 *
 * Usage:
 *   npx tsx scripts/import-addresses.ts <file>
 *
 * The file holds one address per line; blank lines and lines starting with
 * `#` are ignored. Already-pooled addresses are skipped.
 */

import { readFile } from 'node:fs/promises';
import { loadEnv } from '../src/config/env.js';
import { createDb } from '../src/db/index.js';
import { PoolManager } from '../src/services/address-pool.js';
import { DepositEventEmitter, LogEventSink } from '../src/services/events.js';
import { PgStore } from '../src/services/pg-store.js';

function parseAddressList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npx tsx scripts/import-addresses.ts <file>');
    process.exit(1);
  }

  const env = loadEnv();
  if (!env.DATABASE_URL) {
    console.error('DATABASE_URL is required to import addresses');
    process.exit(1);
  }

  const { db, client } = createDb(env.DATABASE_URL, { ssl: env.NODE_ENV === 'production' });
  const store = new PgStore(db);
  const pool = new PoolManager(store, new DepositEventEmitter(store, [new LogEventSink()]), {
    minSize: env.POOL_MIN_SIZE,
    lowThreshold: env.POOL_LOW_THRESHOLD,
    cooldownMs: env.ADDRESS_COOLDOWN_MINUTES * 60_000,
    strandedGraceMs: env.STRANDED_GRACE_MINUTES * 60_000,
  });

  try {
    const addresses = parseAddressList(await readFile(file, 'utf8'));
    console.log(`\nImporting ${addresses.length} address(es) from ${file}\n`);

    const result = await pool.importAddresses(addresses);
    console.log(`  Added:   ${result.added.length}`);
    console.log(`  Skipped: ${result.skipped.length} (already in pool)`);
    console.log(`  Invalid: ${result.invalid.length}`);
    for (const bad of result.invalid) console.log(`    ✗ ${bad}`);

    const status = await pool.getStatus();
    console.log(`\nPool: ${status.available} available / ${status.total} total (${status.health})\n`);
  } finally {
    await client.end({ timeout: 5 });
  }
}

main().catch((err) => {
  console.error('Import failed:', err);
  process.exit(1);
});
