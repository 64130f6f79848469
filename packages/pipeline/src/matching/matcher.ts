import type { Sense, TranslationGroups } from "@sensemap/core";
import type { MatchConfig } from "../config";
import type { EmbeddingProvider } from "./embedding";
import { defaultMatchConfig } from "../config";
import { cosineSimilarity } from "../util";

/** Rows are translation-group labels, columns are senses. */
export type SimilarityMatrix = ReadonlyArray<ReadonlyArray<number>>;

export interface Candidate {
  readonly label: string;
  readonly senseIndex: number;
  readonly score: number;
}

export interface MatchSummary {
  labels: number;
  candidates: number;
  assigned: number;
}

export function similarityMatrix(labelVectors: number[][], senseVectors: number[][]): SimilarityMatrix {
  return Object.freeze(
    labelVectors.map(label => Object.freeze(senseVectors.map(sense => cosineSimilarity(label, sense)))),
  );
}

/**
 * Picks each label's best sense, dropping labels whose best score is under
 * `threshold` or within `gap` of the runner-up.
 */
export function selectCandidates(
  labels: string[],
  matrix: SimilarityMatrix,
  config: MatchConfig,
): Candidate[] {
  const candidates: Candidate[] = [];

  labels.forEach((label, row) => {
    const scores = matrix[row];
    if (!scores || scores.length === 0)
      return;

    let bestIndex = 0;
    let best = -Infinity;
    let second = -Infinity;
    scores.forEach((score, i) => {
      if (score > best) {
        second = best;
        best = score;
        bestIndex = i;
      }
      else if (score > second) {
        second = score;
      }
    });

    if (best < config.threshold)
      return;
    if (scores.length >= 2 && best - second < config.gap)
      return;

    candidates.push({ label, senseIndex: bestIndex, score: best });
  });

  return candidates;
}

/**
 * Sorts candidates by score (ties keep their order) and lets each sense be
 * claimed once, by its strongest candidate.
 */
export function resolveCandidates(candidates: Candidate[]): Candidate[] {
  const sorted = [...candidates].sort((a, b) => b.score - a.score);
  const claimed = new Set<number>();
  const accepted: Candidate[] = [];

  for (const candidate of sorted) {
    if (claimed.has(candidate.senseIndex))
      continue;
    claimed.add(candidate.senseIndex);
    accepted.push(candidate);
  }

  return accepted;
}

/**
 * Attaches each confidently matched translation group to its sense, in
 * place. Senses that win nothing keep an empty translation list.
 */
export async function matchTranslations(
  senses: Sense[],
  groups: TranslationGroups,
  provider: EmbeddingProvider,
  config: MatchConfig = defaultMatchConfig(),
): Promise<MatchSummary> {
  const labels = [...groups.keys()];
  if (senses.length === 0 || labels.length === 0) {
    return { labels: labels.length, candidates: 0, assigned: 0 };
  }

  const senseVectors = await provider.encode(senses.map(s => s.definition));
  const labelVectors = await provider.encode(labels);
  if (senseVectors.length !== senses.length || labelVectors.length !== labels.length) {
    throw new Error(
      `Embedding provider ${provider.model} returned ${senseVectors.length}/${labelVectors.length} vectors for ${senses.length}/${labels.length} inputs`,
    );
  }

  const matrix = similarityMatrix(labelVectors, senseVectors);
  const candidates = selectCandidates(labels, matrix, config);
  const accepted = resolveCandidates(candidates);

  for (const { label, senseIndex } of accepted) {
    const translations = groups.get(label) ?? [];
    senses[senseIndex].translations.push(...translations);
  }

  return { labels: labels.length, candidates: candidates.length, assigned: accepted.length };
}
