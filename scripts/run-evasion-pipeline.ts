import * as fs from 'fs';
import * as path from 'path';
import { loadAnnotations } from '../lib/annotations';
import { ArtifactStore, loadEncoderCheckpoint } from '../lib/artifact-store';
import { loadConfig } from '../lib/config';
import { describeError, isEvasionPipelineError } from '../lib/errors';
import { runEvasionPipeline } from '../lib/evasion-pipeline';
import { loadManifestFilings, parseManifestCsv } from '../lib/filing-manifest';
import { CsvMarketDataSource, YahooMarketDataSource, type MarketDataSource } from '../lib/market-data';
import { formatReport } from '../lib/report-formatter';

/**
 * Run the evasion pipeline over a batch of filings
 *
 * Usage:
 *   npx tsx scripts/run-evasion-pipeline.ts --manifest=data/filings.csv \
 *     [--market=data/returns.csv | --yahoo] [--annotations=data/annotations.csv] \
 *     [--config=data/default-config.json] [--artifacts=artifacts] [--run-id=...] [--checkpoint=...]
 */

// ─── CLI ARGS ──────────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function argValue(name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

const manifestPath = argValue('manifest');
const marketPaths = (argValue('market') ?? '').split(',').filter(p => p.length > 0);
const useYahoo = args.includes('--yahoo');
const annotationsPath = argValue('annotations');
const configPath = argValue('config') ?? 'data/default-config.json';
const artifactsDir = argValue('artifacts') ?? 'artifacts';
const checkpointPath = argValue('checkpoint');
const runId = argValue('run-id') ?? `run-${new Date().toISOString().replace(/[:.]/g, '-')}`;

async function main() {
  console.log('═══════════════════════════════════════════════════════');
  console.log('     DISCLOSURE EVASION PIPELINE');
  console.log('═══════════════════════════════════════════════════════\n');

  if (!manifestPath) {
    console.error('❌ --manifest=<csv> is required');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig(configPath);

  const entries = parseManifestCsv(fs.readFileSync(manifestPath, 'utf-8'), path.basename(manifestPath));
  console.log(`📄 ${entries.length} filings listed in ${manifestPath}`);
  const documents = await loadManifestFilings(entries, path.dirname(manifestPath));
  console.log(`✅ ${documents.length} filings preprocessed\n`);

  let marketSource: MarketDataSource | undefined;
  if (marketPaths.length > 0) {
    marketSource = new CsvMarketDataSource(marketPaths);
  } else if (useYahoo) {
    marketSource = new YahooMarketDataSource();
  } else {
    console.log('⚠️  No market data given (--market or --yahoo); correlation will be empty\n');
  }

  const annotations = annotationsPath ? loadAnnotations(annotationsPath) : undefined;
  const initialCheckpoint = checkpointPath ? loadEncoderCheckpoint(checkpointPath) : undefined;

  const result = await runEvasionPipeline(
    { documents, annotations, marketSource },
    config,
    { runId, artifactStore: new ArtifactStore(artifactsDir), initialCheckpoint },
  );

  console.log('');
  console.log(formatReport(result.report));
  console.log('');
  console.log(`💾 Artifacts: ${path.join(artifactsDir, 'runs', runId)}`);
}

main().catch((error: unknown) => {
  if (isEvasionPipelineError(error)) {
    console.error(`\n❌ ${error.code}: ${error.message}`);
  } else {
    console.error('\n❌ Fatal error:', describeError(error));
  }
  process.exitCode = 1;
});
