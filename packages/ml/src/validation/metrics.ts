/**
 * Binary classification metrics for held-out evaluation
 */

import * as ss from 'simple-statistics';
import { MLError, MLErrorCode, ScoredLabel } from '@creditops/types';

export interface ConfusionMatrix {
  truePositive: number;
  falsePositive: number;
  trueNegative: number;
  falseNegative: number;
}

export interface ClassificationMetrics {
  support: number;
  accuracy: number;
  precision: number;
  recall: number;
  f1: number;
  /** NaN when only one class is present */
  auc: number;
  logLoss: number;
  confusion: ConfusionMatrix;
}

const LOG_LOSS_EPSILON = 1e-15;

function assertSameLength(a: readonly unknown[], b: readonly unknown[]): void {
  if (a.length !== b.length) {
    throw new MLError(MLErrorCode.PREDICTION_FAILED, `Length mismatch: ${a.length} labels vs ${b.length} predictions`);
  }
  if (a.length === 0) {
    throw new MLError(MLErrorCode.PREDICTION_FAILED, 'Cannot compute metrics on an empty set');
  }
}

export function confusionMatrix(actual: readonly ScoredLabel[], predicted: readonly ScoredLabel[]): ConfusionMatrix {
  assertSameLength(actual, predicted);
  const matrix: ConfusionMatrix = { truePositive: 0, falsePositive: 0, trueNegative: 0, falseNegative: 0 };
  actual.forEach((label, i) => {
    if (label === 1) {
      if (predicted[i] === 1) matrix.truePositive++;
      else matrix.falseNegative++;
    } else if (predicted[i] === 1) {
      matrix.falsePositive++;
    } else {
      matrix.trueNegative++;
    }
  });
  return matrix;
}

/**
 * Area under the ROC curve via the rank-sum statistic, ties get average ranks
 */
export function rocAuc(actual: readonly ScoredLabel[], scores: readonly number[]): number {
  assertSameLength(actual, scores);

  const positives = actual.filter((label) => label === 1).length;
  const negatives = actual.length - positives;
  if (positives === 0 || negatives === 0) {
    return NaN;
  }

  const order = scores.map((score, i) => ({ score, i })).sort((a, b) => a.score - b.score);
  const ranks = new Array<number>(scores.length);
  let start = 0;
  while (start < order.length) {
    let end = start;
    while (end + 1 < order.length && order[end + 1].score === order[start].score) end++;
    const averageRank = (start + end) / 2 + 1;
    for (let k = start; k <= end; k++) ranks[order[k].i] = averageRank;
    start = end + 1;
  }

  let positiveRankSum = 0;
  actual.forEach((label, i) => {
    if (label === 1) positiveRankSum += ranks[i];
  });

  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

export function logLoss(actual: readonly ScoredLabel[], probabilities: readonly number[]): number {
  assertSameLength(actual, probabilities);
  const losses = actual.map((label, i) => {
    const p = Math.min(Math.max(probabilities[i], LOG_LOSS_EPSILON), 1 - LOG_LOSS_EPSILON);
    return label === 1 ? -Math.log(p) : -Math.log(1 - p);
  });
  return ss.mean(losses);
}

export function classificationMetrics(
  actual: readonly ScoredLabel[],
  probabilities: readonly number[],
  predicted: readonly ScoredLabel[]
): ClassificationMetrics {
  const confusion = confusionMatrix(actual, predicted);
  const { truePositive, falsePositive, trueNegative, falseNegative } = confusion;

  const precision = truePositive + falsePositive === 0 ? 0 : truePositive / (truePositive + falsePositive);
  const recall = truePositive + falseNegative === 0 ? 0 : truePositive / (truePositive + falseNegative);
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  return {
    support: actual.length,
    accuracy: (truePositive + trueNegative) / actual.length,
    precision,
    recall,
    f1,
    auc: rocAuc(actual, probabilities),
    logLoss: logLoss(actual, probabilities),
    confusion,
  };
}
