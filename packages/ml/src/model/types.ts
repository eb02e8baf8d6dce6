import { CreditRecord, ScoredLabel } from '@creditops/types';

/** One row of the frame a scoring model consumes */
export type ModelInputRow = CreditRecord;

/** Raw model output: the input columns plus the scored columns */
export interface ModelOutputRow extends ModelInputRow {
  ScoredLabels: ScoredLabel;
  ScoredProbabilities: number;
}

/**
 * Trained model handle. Immutable once produced.
 */
export interface ScoringModel {
  readonly id: string;
  score(frame: readonly ModelInputRow[]): ModelOutputRow[];
}
