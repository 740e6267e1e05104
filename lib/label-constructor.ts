/**
 * @module lib/label-constructor
 * @description Builds the evasiveness label and the post-filing market reaction label for every featurized passage
 *
 * PURPOSE:
 * - Score each passage's ambiguity as a weighted sum of its features
 * - Resolve evasiveness per the run's label strategy: human annotation, weak label from the ambiguity score, or human first then weak
 * - Join each document to its market window once and copy the adverse/non-adverse label onto all of its passages
 *
 * EXPORTS:
 * - ambiguityScore (function) - weighted feature sum
 * - buildLabels (function) - passages + features + annotations + market records -> frozen LabelRecords
 *
 * NOTES:
 * - Labels are write-once: every record (and its key) is frozen
 * - A document without a usable market window keeps its evasiveness labels, gets marketReactionLabel null,
 *   and is listed in missingMarketDocuments
 */

import type { PipelineConfig } from './config';
import { MissingMarketDataError } from './errors';
import { computeMarketReaction, indexMarketRecords, type MarketReaction } from './market-reaction';
import {
  FEATURE_NAMES,
  passageKeyId,
  type FeatureName,
  type FeatureValues,
  type FeatureVector,
  type HumanAnnotation,
  type LabelRecord,
  type LabelSource,
  type MarketRecord,
  type Passage,
} from './types';

export type LabelOptions = Pick<
  PipelineConfig,
  | 'labelStrategy'
  | 'weakLabelThreshold'
  | 'ambiguityWeights'
  | 'marketWindowDays'
  | 'maxWindowStartLagDays'
  | 'adverseReturnThreshold'
  | 'benchmarkEntityId'
>;

export interface LabelBuildInput {
  passages: readonly Passage[];
  features: ReadonlyMap<string, FeatureVector>;
  annotations?: readonly HumanAnnotation[];
  marketRecords: readonly MarketRecord[];
}

export interface LabelBuildResult {
  labels: LabelRecord[];
  reactions: Map<string, MarketReaction>;
  missingMarketDocuments: string[];
  labelSources: Record<LabelSource, number>;
  unlabeledPassages: number;
}

export function ambiguityScore(values: FeatureValues, weights: Partial<Record<FeatureName, number>>): number {
  let score = 0;
  for (const name of FEATURE_NAMES) {
    const weight = weights[name];
    if (weight !== undefined) score += weight * values[name];
  }
  return score;
}

function resolveEvasiveness(
  human: number | undefined,
  score: number,
  options: LabelOptions,
): { label: number | null; source: LabelSource | null } {
  const allowHuman = options.labelStrategy !== 'weak';
  const allowWeak = options.labelStrategy !== 'human';

  if (allowHuman && human !== undefined) return { label: human, source: 'human' };
  if (allowWeak) return { label: score >= options.weakLabelThreshold ? 1 : 0, source: 'weak' };
  return { label: null, source: null };
}

export function buildLabels(input: LabelBuildInput, options: LabelOptions): LabelBuildResult {
  const humanLabels = new Map<string, number>();
  for (const annotation of input.annotations ?? []) {
    humanLabels.set(passageKeyId(annotation.key), annotation.label);
  }

  const marketIndex = indexMarketRecords(input.marketRecords);
  const reactions = new Map<string, MarketReaction>();
  const missing = new Set<string>();

  const reactionFor = (passage: Passage): MarketReaction | null => {
    const documentId = passage.key.documentId;
    const known = reactions.get(documentId);
    if (known) return known;
    if (missing.has(documentId)) return null;
    try {
      const reaction = computeMarketReaction(
        { id: documentId, entityId: passage.entityId, filingDate: passage.filingDate },
        marketIndex,
        options,
      );
      reactions.set(documentId, reaction);
      return reaction;
    } catch (error) {
      if (!(error instanceof MissingMarketDataError)) throw error;
      console.warn(`[Labels] ${error.message}`);
      missing.add(documentId);
      return null;
    }
  };

  const labelSources: Record<LabelSource, number> = { human: 0, weak: 0 };
  let unlabeledPassages = 0;
  const labels: LabelRecord[] = [];

  for (const passage of input.passages) {
    const id = passageKeyId(passage.key);
    const vector = input.features.get(id);
    if (!vector) continue;

    const score = ambiguityScore(vector.values, options.ambiguityWeights);
    const { label, source } = resolveEvasiveness(humanLabels.get(id), score, options);
    if (source) labelSources[source]++;
    else unlabeledPassages++;

    const reaction = reactionFor(passage);
    labels.push(
      Object.freeze({
        key: Object.freeze({ ...passage.key }),
        evasivenessLabel: label,
        labelSource: source,
        ambiguityScore: score,
        marketReactionLabel: reaction ? (reaction.adverse ? 1 : 0) : null,
        windowReturn: reaction ? reaction.windowReturn : null,
      }),
    );
  }

  console.log(
    `[Labels] ${labels.length} passages labeled (human=${labelSources.human}, weak=${labelSources.weak}, unlabeled=${unlabeledPassages}); ${missing.size} documents without market window`,
  );

  return {
    labels,
    reactions,
    missingMarketDocuments: [...missing].sort(),
    labelSources,
    unlabeledPassages,
  };
}
