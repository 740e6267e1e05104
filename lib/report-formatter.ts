/**
 * @module lib/report-formatter
 * @description Renders an EvaluationReport as plain text: metrics table, model comparison, correlation summary, run metadata
 *
 * PATTERNS:
 * - `console.log(formatReport(result.report))` at the end of a script run
 *
 * NOTES:
 * - Undefined statistics (null AUC, untestable association) print as N/A
 * - Correlation lines always read as association, never as cause
 */

import { padRight, safeFormatPValue, safeToFixed } from './format-utils';
import type { AssociationResult, EvaluationReport, ModelComparison, ModelMetrics } from './types';

const RULE_WIDTH = 80;

const METRIC_COLUMNS: Array<{ title: string; width: number; value: (m: ModelMetrics) => string }> = [
  { title: 'Model', width: 10, value: (m) => m.modelName },
  { title: 'Passages', width: 10, value: (m) => String(m.passageCount) },
  { title: 'Precision', width: 11, value: (m) => safeToFixed(m.precision) },
  { title: 'Recall', width: 8, value: (m) => safeToFixed(m.recall) },
  { title: 'F1', width: 8, value: (m) => safeToFixed(m.f1) },
  { title: 'ROC-AUC', width: 9, value: (m) => safeToFixed(m.rocAuc) },
  { title: 'Brier', width: 8, value: (m) => safeToFixed(m.brierScore) },
  { title: 'ECE', width: 8, value: (m) => safeToFixed(m.expectedCalibrationError) },
];

function tableRow(cells: readonly string[]): string {
  return cells.map((cell, i) => padRight(cell, METRIC_COLUMNS[i].width)).join('').trimEnd();
}

export function formatMetricsTable(models: readonly ModelMetrics[]): string[] {
  const lines = [tableRow(METRIC_COLUMNS.map((c) => c.title)), '─'.repeat(RULE_WIDTH)];
  for (const model of models) {
    lines.push(tableRow(METRIC_COLUMNS.map((c) => c.value(model))));
  }
  if (models.length === 0) lines.push('(no predictions)');
  return lines;
}

export function formatComparison(comparison: ModelComparison | null): string[] {
  if (!comparison) return ['Comparison: N/A (needs both models)'];
  const lines = [
    `${comparison.challenger} vs ${comparison.champion} over ${comparison.sharedDocumentCount} shared documents`,
  ];
  for (const delta of comparison.deltas) {
    const label = delta.metric === 'f1' ? 'ΔF1' : 'ΔAUC';
    lines.push(
      `  ${padRight(label, 6)}${padRight(safeToFixed(delta.observed), 9)}95% CI [${safeToFixed(delta.ciLower)}, ${safeToFixed(delta.ciUpper)}]  p=${safeFormatPValue(delta.pValue)}  (${delta.iterations} resamples)`,
    );
  }
  return lines;
}

export function formatAssociation(result: AssociationResult): string {
  return (
    `${padRight(result.modelName, 10)}${result.test} (${result.aggregation} per document): ` +
    `effect=${safeToFixed(result.effectSize)} statistic=${safeToFixed(result.statistic)} p=${safeFormatPValue(result.pValue)} ` +
    `n=${result.documentCount} adverse=${result.adverseCount}`
  );
}

export function formatReport(report: EvaluationReport): string {
  const meta = report.runMetadata;
  const lines: string[] = [
    '═'.repeat(RULE_WIDTH),
    `   EVASION REPORT  run ${report.runId}`,
    '═'.repeat(RULE_WIDTH),
    '',
    ...formatMetricsTable(report.models),
    '',
    ...formatComparison(report.comparison),
    '',
    'Association with adverse market reaction (not causal):',
    ...(report.correlation.length > 0 ? report.correlation.map((r) => `  ${formatAssociation(r)}`) : ['  N/A']),
    '',
    `Label sources: human=${report.labelSources.human} weak=${report.labelSources.weak} unlabeled=${meta.unlabeledPassages}`,
    `Skipped: segmentation=${meta.segmentationFailures} features=${meta.featureExtractionFailures} ` +
      `missing market data=${meta.missingMarketDataDocuments} excluded from correlation=${meta.excludedFromCorrelation}`,
    `Evaluated passages: ${meta.evaluatedPassages}`,
  ];
  return lines.join('\n');
}
