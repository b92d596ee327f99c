export const WEIGHT_POLICY_NAMES = ['mean', 'gated-mean', 'yield'] as const;
export type WeightPolicyName = (typeof WEIGHT_POLICY_NAMES)[number];

/** Winner's totals, measured before any of its words were adjusted. */
export type AdjustmentRound = {
  score: number;
  tokenCount: number;
};

export type WeightPolicy = {
  name: WeightPolicyName;
  adjust: (weight: number, round: AdjustmentRound) => number;
};

/** NaN reads as 0; everything else, infinities included, is pinned to [0, 1]. */
export const clampWeight = (weight: number) =>
  Number.isNaN(weight) ? 0 : Math.min(1, Math.max(0, weight));

/** Pulls the weight halfway toward the winner's mean word weight. */
export const meanPolicy: WeightPolicy = {
  name: 'mean',
  adjust: (weight, round) => {
    if (round.tokenCount <= 0) return weight;
    return (weight + round.score / round.tokenCount) / 2;
  },
};

/** `meanPolicy`, but only for samples longer than `threshold` words; short samples are unstable. */
export function gatedMeanPolicy(threshold: number): WeightPolicy {
  return {
    name: 'gated-mean',
    adjust: (weight, round) =>
      round.tokenCount > threshold ? meanPolicy.adjust(weight, round) : weight,
  };
}

/**
 * (w²n + 2wn + S) / (2n + 2wn). Settles at 1 when every word of the sample
 * is trusted and never exceeds (1 + w) / 2.
 */
export const yieldPolicy: WeightPolicy = {
  name: 'yield',
  adjust: (weight, round) => {
    const n = round.tokenCount;
    if (n <= 0) return weight;
    return (weight * weight * n + 2 * weight * n + round.score) / (2 * n + 2 * weight * n);
  },
};

export function createWeightPolicy(
  name: WeightPolicyName,
  options: { adjustThreshold?: number } = {},
): WeightPolicy {
  switch (name) {
    case 'mean':
      return meanPolicy;
    case 'gated-mean':
      return gatedMeanPolicy(options.adjustThreshold ?? 6);
    case 'yield':
      return yieldPolicy;
  }
}
