import type { ClassificationResult, LanguageScore } from '../models';
import { splitWords } from '../tokenizer/splitWords';
import { pushTrace, type TraceEvent } from '../trace';
import type { VocabularyStore } from '../vocabulary/store';
import { meanPolicy, type WeightPolicy } from './weightPolicy';

export const DEFAULT_EPSILON = 0.0001;

export type ClassifyOptions = {
  epsilon?: number;
  minWordLength?: number;
  policy?: WeightPolicy;
  trace?: TraceEvent[];
};

const sumWeights = (words: LanguageScore['words']) =>
  words.reduce((total, word) => total + word.weight, 0);

/** Highest score above `epsilon`; on a tie the earlier language keeps the lead. */
export function pickWinner(
  scores: ReadonlyArray<LanguageScore>,
  epsilon: number = DEFAULT_EPSILON,
): LanguageScore | null {
  let best: LanguageScore | null = null;
  for (const candidate of scores) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best && best.score > epsilon ? best : null;
}

/**
 * Scores `sample` against every language and, when one wins, moves the weights
 * of the winner's induction words with `policy`. The returned scores and words
 * are copies taken before that adjustment.
 */
export function classifySample(
  store: VocabularyStore,
  sample: string,
  options: ClassifyOptions = {},
): ClassificationResult {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const policy = options.policy ?? meanPolicy;

  const scores: LanguageScore[] = store.registry.languages.map((profile) => {
    const tokens = splitWords(profile, sample, { minWordLength: options.minWordLength });
    const words = Object.freeze(store.vocabulary(profile.id).resolveSample(tokens));
    return Object.freeze({ language: profile.id, score: sumWeights(words), words });
  });

  const winner = pickWinner(scores, epsilon);
  if (!winner) {
    pushTrace(options.trace, 'classify.no_winner', {
      epsilon,
      best: Math.max(0, ...scores.map((entry) => entry.score)),
    });
    return Object.freeze({ sample, scores: Object.freeze(scores), winner: null });
  }

  const round = { score: winner.score, tokenCount: winner.words.length };
  const adjusted =
    round.tokenCount > 0
      ? store
          .vocabulary(winner.language)
          .adjustInductions(
            winner.words.map((word) => word.text),
            (weight) => policy.adjust(weight, round),
          )
      : 0;

  pushTrace(options.trace, 'classify.winner', {
    language: winner.language,
    score: winner.score,
    tokenCount: round.tokenCount,
    adjusted,
    policy: policy.name,
  });

  return Object.freeze({ sample, scores: Object.freeze(scores), winner });
}
