import { createReferenceDataCache } from '@comtrade/client';

async function main() {
  const cache = createReferenceDataCache();
  await cache.ensureDataDir();
  const tables = await cache.updateAll();
  for (const [name, table] of tables) {
    console.log(`${name}: ${table.rowCount} rows`);
  }
  console.log(`Reference tables written to ${cache.dataDir}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
