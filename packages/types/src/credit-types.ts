/**
 * Credit Default Types
 * Account record, scored response and the service schemas declared for them
 */

import { RecordOf, ServiceSchema } from './schema-types';

export const CREDIT_INPUT_SCHEMA = {
  account_id: 'character',
  amount_6: 'numeric',
  pur_6: 'numeric',
  avg_pur_amt_6: 'numeric',
  avg_interval_pur_6: 'numeric',
  credit_limit: 'numeric',
  marital_status: 'character',
  sex: 'character',
  education: 'character',
  income: 'numeric',
  age: 'numeric',
} as const satisfies ServiceSchema;

export const CREDIT_OUTPUT_SCHEMA = {
  answer: 'data.frame',
} as const satisfies ServiceSchema;

/** One account as seen by training and scoring. */
export type CreditRecord = RecordOf<typeof CREDIT_INPUT_SCHEMA>;

export type CreditFeatures = Omit<CreditRecord, 'account_id'>;

export const NUMERIC_FEATURES = [
  'amount_6',
  'pur_6',
  'avg_pur_amt_6',
  'avg_interval_pur_6',
  'credit_limit',
  'age',
  'income',
] as const;

export const CATEGORICAL_FEATURES = ['marital_status', 'sex', 'education'] as const;

export type NumericFeature = (typeof NUMERIC_FEATURES)[number];
export type CategoricalFeature = (typeof CATEGORICAL_FEATURES)[number];

export type ScoredLabel = 0 | 1;

export interface LabeledCreditRecord extends CreditRecord {
  bad_ind: ScoredLabel;
}

/**
 * Scored account returned by the prediction adapter.
 * Field order is part of the contract.
 */
export interface PredictionResponse {
  account_id: string;
  scored_label: ScoredLabel;
  scored_prob: number;
}

export const PREDICTION_FIELDS = ['account_id', 'scored_label', 'scored_prob'] as const;
