/**
 * Frozen TF-IDF feature space over word n-grams.
 *
 * Built once from the training split and never mutated afterwards.
 * Inference projects text through exactly this vocabulary; terms that
 * were not selected at fit time contribute nothing.
 */

import natural from 'natural';

// ============================================================================
// Types
// ============================================================================

export interface FeatureSpaceOptions {
  /** Vocabulary cap (default 500) */
  maxFeatures: number;
  /** Inclusive n-gram length range (default [1, 2]) */
  ngramRange: [number, number];
}

/** Serializable form stored inside a persisted model */
export interface FeatureSpaceState {
  vocabulary: string[];
  idf: number[];
  ngramRange: [number, number];
}

/** L2-normalized sparse row; indices ascending */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export const DEFAULT_FEATURE_SPACE_OPTIONS: FeatureSpaceOptions = {
  maxFeatures: 500,
  ngramRange: [1, 2],
};

/** Tokens shorter than this are ignored */
const MIN_TOKEN_LENGTH = 2;

// ============================================================================
// Term Extraction
// ============================================================================

/**
 * Split normalized text into n-gram terms.
 *
 * Single-character tokens are dropped before n-grams are formed, so a
 * bigram never spans a dropped token.
 */
export function extractTerms(normalized: string, ngramRange: [number, number]): string[] {
  const tokens = normalized
    .split(' ')
    .filter((token) => [...token].length >= MIN_TOKEN_LENGTH);

  const terms: string[] = [];
  const [minN, maxN] = ngramRange;
  for (let n = minN; n <= maxN; n++) {
    const grams = natural.NGrams.ngrams(tokens, n);
    if (!Array.isArray(grams)) continue;
    for (const gram of grams) {
      terms.push(gram.join(' '));
    }
  }
  return terms;
}

function countTerms(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

// ============================================================================
// FeatureSpace
// ============================================================================

export class FeatureSpace {
  private readonly index: Map<string, number>;

  private constructor(private readonly state: FeatureSpaceState) {
    this.index = new Map(state.vocabulary.map((term, i) => [term, i]));
  }

  /**
   * Build a feature space from normalized training documents.
   *
   * IDF is smoothed: ln((1 + n) / (1 + df)) + 1. Terms are ranked by
   * their summed TF-IDF weight over the corpus (ties alphabetical) and
   * the top `maxFeatures` are kept, then indexed alphabetically.
   */
  static fit(
    documents: readonly string[],
    options: FeatureSpaceOptions = DEFAULT_FEATURE_SPACE_OPTIONS,
  ): FeatureSpace {
    const corpusCounts = new Map<string, number>();
    const documentFrequency = new Map<string, number>();

    for (const document of documents) {
      const counts = countTerms(extractTerms(document, options.ngramRange));
      for (const [term, count] of counts) {
        corpusCounts.set(term, (corpusCounts.get(term) ?? 0) + count);
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const n = documents.length;
    const idfOf = (term: string): number =>
      Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1;

    const ranked = [...corpusCounts.entries()]
      .map(([term, count]) => ({ term, weight: count * idfOf(term) }))
      .sort((a, b) => {
        if (b.weight !== a.weight) return b.weight - a.weight;
        return a.term < b.term ? -1 : a.term > b.term ? 1 : 0;
      })
      .slice(0, options.maxFeatures)
      .map((entry) => entry.term)
      .sort();

    return new FeatureSpace({
      vocabulary: ranked,
      idf: ranked.map(idfOf),
      ngramRange: [options.ngramRange[0], options.ngramRange[1]],
    });
  }

  /**
   * Rebuild a frozen feature space from its persisted state.
   * Callers validate the state shape first.
   */
  static fromState(state: FeatureSpaceState): FeatureSpace {
    return new FeatureSpace({
      vocabulary: [...state.vocabulary],
      idf: [...state.idf],
      ngramRange: [state.ngramRange[0], state.ngramRange[1]],
    });
  }

  /** Number of features (vocabulary size) */
  get size(): number {
    return this.state.vocabulary.length;
  }

  /**
   * Project normalized text into the frozen space.
   */
  transform(normalized: string): SparseVector {
    const counts = countTerms(extractTerms(normalized, this.state.ngramRange));

    const entries: Array<[number, number]> = [];
    for (const [term, count] of counts) {
      const index = this.index.get(term);
      if (index === undefined) continue;
      entries.push([index, count * this.state.idf[index]]);
    }
    entries.sort((a, b) => a[0] - b[0]);

    const norm = Math.sqrt(entries.reduce((acc, [, value]) => acc + value * value, 0));
    return {
      indices: entries.map(([index]) => index),
      values: entries.map(([, value]) => (norm > 0 ? value / norm : 0)),
    };
  }

  toJSON(): FeatureSpaceState {
    return {
      vocabulary: [...this.state.vocabulary],
      idf: [...this.state.idf],
      ngramRange: [this.state.ngramRange[0], this.state.ngramRange[1]],
    };
  }
}
