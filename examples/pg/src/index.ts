import { Pool } from 'pg';
import { AccessGuard } from '@txcache/core';
import { loadPermissions } from '@txcache/orchestrator';
import { withQueryCache, buildInClause } from '@txcache/pg';

async function main() {
  // Initialize pg pool
  const pool = new Pool({ connectionString: process.env.DATABASE_URL });

  // Permission profile for the pre-checks
  const guard = new AccessGuard({
    profile: await loadPermissions({
      json: {
        version: 1,
        objects: {
          accounts: {
            label: 'Account',
            read: true,
            fields: { id: { read: true }, name: { label: 'Account Name', read: true } },
          },
        },
      },
    }),
  });

  // Wrap with the transaction cache
  const db = withQueryCache(pool, {
    insights: {
      emit: (event) => {
        console.log(`[txcache] ${event.store} ${event.eventType}:`, event.queryKey);
      },
    },
  });

  console.log('\n=== txcache + pg Example ===\n');

  await db.transaction(async (tx) => {
    guard.checkReadable('accounts', ['id', 'name']);

    // Example 1: Cache miss - first query
    const query = `SELECT id, name FROM accounts WHERE id IN ${buildInClause([1, 2])}`;
    console.log('1. First query (cache miss)...');
    const accounts = await tx.cache.fetchObjects(query);
    console.log(`Found ${accounts.size} accounts\n`);

    // Example 2: Cache hit - same query text
    console.log('2. Same query again (cache hit)...');
    const again = await tx.cache.fetchObjects(query);
    console.log(`Same instance: ${again === accounts}\n`);

    // Example 3: List store is independent of the map store
    console.log('3. Same query as a list (separate store, cache miss)...');
    const rows = await tx.cache.getListOfRecords(query);
    console.log(`Found ${rows.length} rows\n`);

    // Example 4: Write, then invalidate by hand
    console.log('4. Renaming an account and invalidating...');
    await tx.client.query(`UPDATE accounts SET name = 'Renamed' WHERE id = 1`);
    tx.cache.invalidateMap(query);
    tx.cache.invalidateList(query);
    const refreshed = await tx.cache.fetchObjects(query);
    console.log(`Account 1 is now: ${String(refreshed.get(1)?.name)}\n`);
  });

  // Example 5: Diagnostics
  console.log('5. Diagnostics:');
  console.log('Cache stats:', db.getCacheStats());

  await pool.end();
}

main()
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
