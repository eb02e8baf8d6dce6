/**
 * CreditDefaultModel - trained handle scoring the default risk of credit accounts
 */

import { z } from 'zod';
import { CreditFeatures, MLError, MLErrorCode } from '@creditops/types';
import { FeatureEncoder } from '../features/FeatureEncoder';
import { GradientBoostingClassifier } from '../boosting/GradientBoostingClassifier';
import { TreeNode } from '../boosting/RegressionTree';
import { ModelInputRow, ModelOutputRow, ScoringModel } from './types';

export const MODEL_FORMAT = 'creditops.gbdt.v1';

const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('leaf'), value: z.number() }),
    z.object({
      kind: z.literal('split'),
      feature: z.number().int().nonnegative(),
      threshold: z.number(),
      gain: z.number(),
      left: TreeNodeSchema,
      right: TreeNodeSchema,
    }),
  ])
);

const BoostingOptionsSchema = z.object({
  nRounds: z.number().int().positive(),
  learningRate: z.number().positive().max(1),
  maxDepth: z.number().int().positive(),
  minSamplesLeaf: z.number().int().positive(),
  lambda: z.number().nonnegative(),
});

export const SerializedCreditModelSchema = z.object({
  format: z.literal(MODEL_FORMAT),
  metadata: z.object({
    id: z.string().min(1),
    createdAt: z.string(),
    algorithm: z.literal('gradient-boosted-trees'),
    threshold: z.number().gt(0).lt(1),
    featureNames: z.array(z.string()),
    trainingRows: z.number().int().nonnegative(),
    hyperparameters: BoostingOptionsSchema,
  }),
  encoder: z.object({
    categories: z.object({
      marital_status: z.array(z.string()),
      sex: z.array(z.string()),
      education: z.array(z.string()),
    }),
  }),
  booster: z.object({
    options: BoostingOptionsSchema,
    featureCount: z.number().int().positive(),
    baseScore: z.number(),
    trees: z.array(TreeNodeSchema).min(1),
  }),
});

export type SerializedCreditModel = z.infer<typeof SerializedCreditModelSchema>;
export type CreditModelMetadata = SerializedCreditModel['metadata'];

export class CreditDefaultModel implements ScoringModel {
  readonly metadata: Readonly<CreditModelMetadata>;

  constructor(
    private readonly encoder: FeatureEncoder,
    private readonly booster: GradientBoostingClassifier,
    metadata: CreditModelMetadata
  ) {
    this.metadata = Object.freeze({
      ...metadata,
      featureNames: [...metadata.featureNames],
      hyperparameters: { ...metadata.hyperparameters },
    });
  }

  get id(): string {
    return this.metadata.id;
  }

  get threshold(): number {
    return this.metadata.threshold;
  }

  predictProbability(record: CreditFeatures): number {
    const [probability] = this.booster.predictProba([this.encoder.transform(record)]);
    return probability;
  }

  score(frame: readonly ModelInputRow[]): ModelOutputRow[] {
    return frame.map((row) => {
      const probability = this.predictProbability(row);
      return {
        ...row,
        ScoredLabels: probability >= this.threshold ? 1 : 0,
        ScoredProbabilities: probability,
      };
    });
  }

  toJSON(): SerializedCreditModel {
    return {
      format: MODEL_FORMAT,
      metadata: {
        ...this.metadata,
        featureNames: [...this.metadata.featureNames],
        hyperparameters: { ...this.metadata.hyperparameters },
      },
      encoder: this.encoder.toJSON(),
      booster: this.booster.toJSON(),
    };
  }

  static fromJSON(value: unknown): CreditDefaultModel {
    const parsed = SerializedCreditModelSchema.safeParse(value);
    if (!parsed.success) {
      throw new MLError(
        MLErrorCode.INVALID_MODEL,
        `Not a ${MODEL_FORMAT} model: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`,
        parsed.error.issues
      );
    }

    const { metadata, encoder, booster } = parsed.data;
    const featureEncoder = FeatureEncoder.fromJSON(encoder);
    const featureCount = featureEncoder.featureNames.length;
    if (booster.featureCount !== featureCount || metadata.featureNames.length !== featureCount) {
      throw new MLError(
        MLErrorCode.INVALID_MODEL,
        `Feature count mismatch: encoder yields ${featureCount}, booster expects ${booster.featureCount}`
      );
    }

    return new CreditDefaultModel(featureEncoder, GradientBoostingClassifier.fromJSON(booster), metadata);
  }
}
