import type {
  ClassificationResult,
  LanguageId,
  LanguageScore,
  ValidationObservation,
} from '../models';
import type { Dictionary } from '../vocabulary/store';

export type Verdict = 'correct' | 'incorrect' | 'undecided';

export type LanguageTally = {
  language: LanguageId;
  truePositives: number;
  falsePositives: number;
};

export type ValidationReport = {
  total: number;
  correct: number;
  incorrect: number;
  undecided: number;
  /** correct / total, 0 for an empty report. */
  accuracy: number;
  /** incorrect / correct, null while nothing is correct. */
  errorRatio: number | null;
  /** Winning languages only, in order of first appearance. */
  perLanguage: LanguageTally[];
};

export type BarSegments = {
  language: LanguageId;
  /** Running totals of word weights; the last one equals the score. */
  segments: number[];
};

export type VocabularyDistribution = {
  language: LanguageId;
  axioms: number;
  /** Induction entries with a positive weight. */
  inductions: number;
  /** Induction entries still at weight 0. */
  dormant: number;
};

export const findWinner = (result: ClassificationResult): LanguageScore | null => result.winner;

/** Descending by score; equal scores keep enumeration order. */
export function rankContenders(result: ClassificationResult): LanguageScore[] {
  return [...result.scores].sort((a, b) => b.score - a.score);
}

export function stackedSegments(result: ClassificationResult): BarSegments[] {
  return result.scores.map((entry) => {
    let running = 0;
    return {
      language: entry.language,
      segments: entry.words.map((word) => {
        running += word.weight;
        return running;
      }),
    };
  });
}

export function judge(observation: ValidationObservation): Verdict {
  const winner = observation.result.winner;
  if (!winner) return 'undecided';
  return winner.language === observation.expected ? 'correct' : 'incorrect';
}

export function analyzeValidation(
  observations: ReadonlyArray<ValidationObservation>,
): ValidationReport {
  const tallies = new Map<LanguageId, LanguageTally>();
  const counts: Record<Verdict, number> = { correct: 0, incorrect: 0, undecided: 0 };

  observations.forEach((observation) => {
    const verdict = judge(observation);
    counts[verdict] += 1;
    const winner = observation.result.winner;
    if (!winner) return;

    const tally = tallies.get(winner.language) ?? {
      language: winner.language,
      truePositives: 0,
      falsePositives: 0,
    };
    if (verdict === 'correct') {
      tally.truePositives += 1;
    } else {
      tally.falsePositives += 1;
    }
    tallies.set(winner.language, tally);
  });

  const total = observations.length;
  return {
    total,
    ...counts,
    accuracy: total === 0 ? 0 : counts.correct / total,
    errorRatio: counts.correct === 0 ? null : counts.incorrect / counts.correct,
    perLanguage: Array.from(tallies.values()),
  };
}

export function vocabularyDistribution(dictionary: Dictionary): VocabularyDistribution[] {
  return Array.from(dictionary, ([language, words]) => ({
    language,
    axioms: words.filter((word) => word.kind === 'axiom').length,
    inductions: words.filter((word) => word.kind === 'induction' && word.weight > 0).length,
    dormant: words.filter((word) => word.kind === 'induction' && word.weight === 0).length,
  }));
}
