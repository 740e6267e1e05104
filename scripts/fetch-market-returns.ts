import * as fs from 'fs';
import { describeError } from '../lib/errors';
import { YahooMarketDataSource, formatReturnsCsv } from '../lib/market-data';

/**
 * Fetch daily returns from Yahoo Finance into a returns CSV
 *
 * Usage:
 *   npx tsx scripts/fetch-market-returns.ts --tickers=AAPL,MSFT,SPY --from=2022-01-01 --to=2024-12-31 [--out=data/returns.csv]
 */

const args = process.argv.slice(2);

function argValue(name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

async function main() {
  const tickers = (argValue('tickers') ?? '').split(',').map(t => t.trim().toUpperCase()).filter(t => t.length > 0);
  const from = argValue('from');
  const to = argValue('to') ?? new Date().toISOString().slice(0, 10);
  const out = argValue('out') ?? 'data/returns.csv';

  if (tickers.length === 0 || !from) {
    console.error('❌ --tickers=<list> and --from=<YYYY-MM-DD> are required');
    process.exitCode = 1;
    return;
  }

  console.log(`📈 Fetching ${tickers.length} tickers from Yahoo Finance (${from} to ${to})...\n`);
  const records = await new YahooMarketDataSource().load(tickers, from, to);

  fs.writeFileSync(out, formatReturnsCsv(records));
  const covered = new Set(records.map(r => r.entityId));
  console.log(`\n✅ Wrote ${records.length} daily returns for ${covered.size}/${tickers.length} tickers to ${out}`);
  const missing = tickers.filter(t => !covered.has(t));
  if (missing.length > 0) {
    console.log(`⚠️  No data: ${missing.join(', ')}`);
  }
}

main().catch((error: unknown) => {
  console.error('\n❌ Fatal error:', describeError(error));
  process.exitCode = 1;
});
