/**
 * CreditModelTrainer - fits and evaluates credit default models
 */

import { LabeledCreditRecord, MLError, MLErrorCode } from '@creditops/types';
import { Logger, generateId } from '@creditops/utils';
import { FeatureEncoder } from '../features/FeatureEncoder';
import {
  BoostingOptions,
  DEFAULT_BOOSTING_OPTIONS,
  GradientBoostingClassifier,
} from '../boosting/GradientBoostingClassifier';
import { CreditDefaultModel } from '../model/CreditDefaultModel';
import { ClassificationMetrics, classificationMetrics } from '../validation/metrics';

export interface TrainingOptions extends Partial<BoostingOptions> {
  /** Probability at or above which an account is labeled as a default */
  threshold?: number;
}

export class CreditModelTrainer {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  train(records: readonly LabeledCreditRecord[], options: TrainingOptions = {}): CreditDefaultModel {
    const { threshold = 0.5, ...boosting } = options;
    const hyperparameters: BoostingOptions = { ...DEFAULT_BOOSTING_OPTIONS, ...boosting };

    if (!(threshold > 0 && threshold < 1)) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, `threshold must be in (0, 1), got ${threshold}`);
    }
    if (records.length === 0) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, 'Cannot train on an empty dataset');
    }

    this.logger.info('Training credit default model', {
      rows: records.length,
      positives: records.filter((record) => record.bad_ind === 1).length,
      ...hyperparameters,
    });

    const startedAt = Date.now();
    const encoder = FeatureEncoder.fit(records);
    const X = records.map((record) => encoder.transform(record));
    const y = records.map((record) => record.bad_ind);

    const booster = new GradientBoostingClassifier(hyperparameters).fit(X, y);

    const model = new CreditDefaultModel(encoder, booster, {
      id: generateId('model'),
      createdAt: new Date().toISOString(),
      algorithm: 'gradient-boosted-trees',
      threshold,
      featureNames: encoder.featureNames,
      trainingRows: records.length,
      hyperparameters,
    });

    this.logger.info('Model trained', {
      modelId: model.id,
      trees: booster.treeCount,
      features: encoder.featureNames.length,
      durationMs: Date.now() - startedAt,
    });

    return model;
  }

  evaluate(model: CreditDefaultModel, records: readonly LabeledCreditRecord[]): ClassificationMetrics {
    const scored = model.score(records);
    const metrics = classificationMetrics(
      records.map((record) => record.bad_ind),
      scored.map((row) => row.ScoredProbabilities),
      scored.map((row) => row.ScoredLabels)
    );

    this.logger.info('Model evaluated', {
      modelId: model.id,
      support: metrics.support,
      accuracy: metrics.accuracy,
      auc: metrics.auc,
      logLoss: metrics.logLoss,
    });

    return metrics;
  }
}
