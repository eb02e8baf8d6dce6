/**
 * GradientBoostingClassifier - binary classifier on boosted regression trees
 *
 * Logistic loss, Newton steps per leaf, shrinkage by learningRate. The
 * initial score is the log-odds of the training prior.
 */

import * as ss from 'simple-statistics';
import { MLError, MLErrorCode } from '@creditops/types';
import { TreeNode, buildTree, maxSplitFeature, predictTree } from './RegressionTree';

export interface BoostingOptions {
  nRounds: number;
  learningRate: number;
  maxDepth: number;
  minSamplesLeaf: number;
  lambda: number;
}

export const DEFAULT_BOOSTING_OPTIONS: BoostingOptions = {
  nRounds: 40,
  learningRate: 0.2,
  maxDepth: 3,
  minSamplesLeaf: 5,
  lambda: 1,
};

export interface BoostingState {
  options: BoostingOptions;
  featureCount: number;
  baseScore: number;
  trees: TreeNode[];
}

const MIN_HESSIAN = 1e-16;

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

function validateOptions(options: BoostingOptions): void {
  const problems: string[] = [];
  if (!Number.isInteger(options.nRounds) || options.nRounds < 1) problems.push('nRounds must be a positive integer');
  if (!(options.learningRate > 0 && options.learningRate <= 1)) problems.push('learningRate must be in (0, 1]');
  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) problems.push('maxDepth must be a positive integer');
  if (!Number.isInteger(options.minSamplesLeaf) || options.minSamplesLeaf < 1) problems.push('minSamplesLeaf must be a positive integer');
  if (!(options.lambda >= 0)) problems.push('lambda must be non-negative');

  if (problems.length > 0) {
    throw new MLError(MLErrorCode.TRAINING_FAILED, `Invalid boosting options: ${problems.join('; ')}`);
  }
}

export class GradientBoostingClassifier {
  readonly options: BoostingOptions;
  private baseScore = 0;
  private featureCount = 0;
  private trees: TreeNode[] = [];

  constructor(options: Partial<BoostingOptions> = {}) {
    this.options = { ...DEFAULT_BOOSTING_OPTIONS, ...options };
    validateOptions(this.options);
  }

  get isFitted(): boolean {
    return this.trees.length > 0;
  }

  get treeCount(): number {
    return this.trees.length;
  }

  fit(X: number[][], y: number[]): this {
    if (X.length === 0) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, 'Cannot train on an empty dataset');
    }
    if (X.length !== y.length) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, `Got ${X.length} rows but ${y.length} targets`);
    }
    const featureCount = X[0].length;
    if (X.some((row) => row.length !== featureCount)) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, 'All rows must have the same number of features');
    }
    if (y.some((target) => target !== 0 && target !== 1)) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, 'Targets must be 0 or 1');
    }

    const prior = ss.mean(y);
    if (prior === 0 || prior === 1) {
      throw new MLError(MLErrorCode.TRAINING_FAILED, 'Training targets contain a single class');
    }

    this.featureCount = featureCount;
    this.baseScore = Math.log(prior / (1 - prior));
    this.trees = [];

    const margins = new Array<number>(X.length).fill(this.baseScore);
    const indices = X.map((_, i) => i);
    const treeOptions = {
      maxDepth: this.options.maxDepth,
      minSamplesLeaf: this.options.minSamplesLeaf,
      lambda: this.options.lambda,
      minGain: 0,
    };

    for (let round = 0; round < this.options.nRounds; round++) {
      const grad: number[] = [];
      const hess: number[] = [];
      for (let i = 0; i < X.length; i++) {
        const p = sigmoid(margins[i]);
        grad.push(p - y[i]);
        hess.push(Math.max(p * (1 - p), MIN_HESSIAN));
      }

      const tree = buildTree(X, grad, hess, indices, treeOptions);
      this.trees.push(tree);

      for (let i = 0; i < X.length; i++) {
        margins[i] += this.options.learningRate * predictTree(tree, X[i]);
      }
    }

    return this;
  }

  decisionFunction(X: number[][]): number[] {
    if (!this.isFitted) {
      throw new MLError(MLErrorCode.PREDICTION_FAILED, 'Model has not been trained');
    }
    return X.map((row) => {
      if (row.length !== this.featureCount) {
        throw new MLError(
          MLErrorCode.PREDICTION_FAILED,
          `Expected ${this.featureCount} features, got ${row.length}`
        );
      }
      let margin = this.baseScore;
      for (const tree of this.trees) {
        margin += this.options.learningRate * predictTree(tree, row);
      }
      return margin;
    });
  }

  /**
   * Probability of the positive class for each row
   */
  predictProba(X: number[][]): number[] {
    return this.decisionFunction(X).map(sigmoid);
  }

  toJSON(): BoostingState {
    return {
      options: { ...this.options },
      featureCount: this.featureCount,
      baseScore: this.baseScore,
      trees: this.trees,
    };
  }

  static fromJSON(state: BoostingState): GradientBoostingClassifier {
    state.trees.forEach((tree, index) => {
      const feature = maxSplitFeature(tree);
      if (feature >= state.featureCount) {
        throw new MLError(
          MLErrorCode.INVALID_MODEL,
          `Tree ${index} splits on feature ${feature} but the model has ${state.featureCount} features`
        );
      }
    });

    const model = new GradientBoostingClassifier(state.options);
    model.featureCount = state.featureCount;
    model.baseScore = state.baseScore;
    model.trees = state.trees;
    return model;
  }
}
