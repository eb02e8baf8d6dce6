/**
 * FeatureEncoder - turns credit records into numeric feature vectors
 *
 * Numeric fields pass through unchanged. Categorical fields are one-hot
 * encoded against the vocabulary seen at fit time; unseen values encode as
 * all zeros.
 */

import {
  CATEGORICAL_FEATURES,
  CategoricalFeature,
  CreditFeatures,
  MLError,
  MLErrorCode,
  NUMERIC_FEATURES,
} from '@creditops/types';

export type CategoryVocabulary = Record<CategoricalFeature, string[]>;

export interface FeatureEncoderState {
  categories: CategoryVocabulary;
}

export class FeatureEncoder {
  private readonly categories: CategoryVocabulary;

  constructor(categories: CategoryVocabulary) {
    this.categories = {
      marital_status: [...categories.marital_status],
      sex: [...categories.sex],
      education: [...categories.education],
    };
  }

  static fit(records: readonly CreditFeatures[]): FeatureEncoder {
    const vocabulary = (feature: CategoricalFeature) =>
      Array.from(new Set(records.map((record) => record[feature]))).sort();

    return new FeatureEncoder({
      marital_status: vocabulary('marital_status'),
      sex: vocabulary('sex'),
      education: vocabulary('education'),
    });
  }

  get featureNames(): string[] {
    const names: string[] = [...NUMERIC_FEATURES];
    for (const feature of CATEGORICAL_FEATURES) {
      for (const value of this.categories[feature]) {
        names.push(`${feature}=${value}`);
      }
    }
    return names;
  }

  transform(record: CreditFeatures): number[] {
    const vector: number[] = [];

    for (const feature of NUMERIC_FEATURES) {
      const value: unknown = record[feature];
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MLError(
          MLErrorCode.PREDICTION_FAILED,
          `Feature ${feature} must be a finite number, got ${JSON.stringify(value)}`
        );
      }
      vector.push(value);
    }

    for (const feature of CATEGORICAL_FEATURES) {
      const value: unknown = record[feature];
      if (typeof value !== 'string') {
        throw new MLError(
          MLErrorCode.PREDICTION_FAILED,
          `Feature ${feature} must be a string, got ${JSON.stringify(value)}`
        );
      }
      for (const category of this.categories[feature]) {
        vector.push(category === value ? 1 : 0);
      }
    }

    return vector;
  }

  toJSON(): FeatureEncoderState {
    return {
      categories: {
        marital_status: [...this.categories.marital_status],
        sex: [...this.categories.sex],
        education: [...this.categories.education],
      },
    };
  }

  static fromJSON(state: FeatureEncoderState): FeatureEncoder {
    return new FeatureEncoder(state.categories);
  }
}
