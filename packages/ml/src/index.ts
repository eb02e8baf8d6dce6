/**
 * @creditops/ml - training and scoring for the credit default model
 *
 * - Dataset loading and train/test splitting
 * - Feature encoding and gradient-boosted trees
 * - Model handle, persistence and evaluation
 * - Prediction adapter exposed by the hosting service
 */

export * from './data/DataLoader';
export * from './data/split';
export * from './features/FeatureEncoder';
export * from './boosting/RegressionTree';
export * from './boosting/GradientBoostingClassifier';
export * from './model/types';
export * from './model/CreditDefaultModel';
export * from './model/persistence';
export * from './validation/metrics';
export * from './training/CreditModelTrainer';
export * from './adapter/predictionAdapter';
