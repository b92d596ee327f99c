import type { ClassificationResult } from '../models';
import {
  rankContenders,
  type ValidationReport,
  type VocabularyDistribution,
} from './results';

const formatScore = (score: number) => score.toFixed(4);

export function formatWinner(result: ClassificationResult): string | null {
  return result.winner ? `${result.winner.language}: ${formatScore(result.winner.score)}` : null;
}

/** One `language: score` line per contender, best first. Zero scores are left out unless asked for. */
export function formatScores(
  result: ClassificationResult,
  options: { includeZero?: boolean } = {},
): string[] {
  return rankContenders(result)
    .filter((entry) => options.includeZero || entry.score > 0)
    .map((entry) => `${entry.language}: ${formatScore(entry.score)}`);
}

export function formatValidationSummary(report: ValidationReport, title = 'Validation summary'): string {
  const ratio = report.errorRatio === null ? 'n/a' : report.errorRatio.toFixed(4);
  return [
    `${title}:`,
    `Correct guesses: ${report.correct}`,
    `Wrong guesses: ${report.incorrect}`,
    `Undecided: ${report.undecided}`,
    `Accuracy: ${(report.accuracy * 100).toFixed(1)}%`,
    `Wrong/correct ratio: ${ratio}`,
  ].join('\n');
}

export function formatDistribution(distribution: ReadonlyArray<VocabularyDistribution>): string[] {
  return distribution
    .filter((entry) => entry.axioms + entry.inductions + entry.dormant > 0)
    .map(
      (entry) =>
        `${entry.language}: ${entry.axioms} axioms, ${entry.inductions} inductions, ${entry.dormant} dormant`,
    );
}
