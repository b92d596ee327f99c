import {
  analyzeValidation,
  formatDistribution,
  formatScores,
  formatValidationSummary,
  formatWinner,
  vocabularyDistribution,
  type BatchReport,
  type LanguageDetector,
} from '@glossa/core';

export const QUIT_COMMANDS = new Set([':q', ':quit', ':exit']);

/** Lines printed after semi-supervised training. */
export function trainingSummary(detector: LanguageDetector, report: BatchReport): string[] {
  return [
    `Axiom records: ${report.axiomRecords}`,
    formatValidationSummary(analyzeValidation(report.observations)),
    ...formatDistribution(vocabularyDistribution(detector.dictionary())),
  ];
}

/** Classifies one prompt line; returns what to print. */
export function answer(detector: LanguageDetector, line: string): string[] {
  const result = detector.classify(line);
  const winner = formatWinner(result);
  if (!winner) {
    return ['No language recognised.'];
  }
  return [`Most likely ${winner}`, ...formatScores(result).slice(1).map((entry) => `  ${entry}`)];
}
