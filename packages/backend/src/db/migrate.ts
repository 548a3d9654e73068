import { db } from './connection.js';

async function main(): Promise<void> {
  const [batch, applied] = await db.migrate.latest();
  if (applied.length === 0) {
    console.log('Database already up to date.');
  } else {
    console.log(`Batch ${batch} applied ${applied.length} migration(s):`);
    for (const name of applied) console.log(`  ${name}`);
  }
  await db.destroy();
}

main().catch(async (err) => {
  console.error('Migration failed:', err);
  await db.destroy();
  process.exit(1);
});
