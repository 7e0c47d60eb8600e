/**
 * Fetch and parse one resort's conditions page and print the result.
 * Usage: npx tsx src/scripts/check-resort.ts <slug>
 */
import { findAdapter } from '../adapters/index.js';
import { config } from '../config.js';
import { loadResorts } from '../registry/loader.js';
import { fetchHttp } from '../workers/http-client.js';

const slug = process.argv[2];
if (!slug) {
  console.error('Usage: check-resort <slug>');
  process.exit(1);
}

const resorts = await loadResorts(config.RESORTS_FILE);
const resort = resorts.find((r) => r.slug === slug);
if (!resort) {
  console.error(`No resort "${slug}" in ${config.RESORTS_FILE}`);
  console.error(`Known: ${resorts.map((r) => r.slug).join(', ')}`);
  process.exit(1);
}

const adapter = findAdapter(resort.kind);
console.log(`\n=== ${resort.name} (${resort.slug}) ===`);
console.log(`  URL: ${resort.source_url}`);
console.log(`  Kind: ${resort.kind}${resort.enabled ? '' : ' (disabled)'}`);

if (!adapter) {
  console.error(`  No adapter for kind "${resort.kind}"`);
  process.exit(1);
}
if (adapter.config.fetchMethod === 'headless') {
  console.log('  Needs headless rendering; not fetched');
  process.exit(0);
}

try {
  const result = await fetchHttp(resort.source_url);
  console.log(`  HTTP status: ${result.status}, size: ${result.body.length} bytes`);

  const parsed = adapter.parse(result.body);
  if (parsed.ok) {
    console.log('  Operations:', JSON.stringify(parsed.ops, null, 2));
    console.log('  Snow:', JSON.stringify(parsed.snow, null, 2));
  } else {
    console.log(`  Parse failed: ${parsed.error}${parsed.needsHeadless ? ' (needs headless)' : ''}`);
  }
} catch (err) {
  console.error(`  ERROR: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
