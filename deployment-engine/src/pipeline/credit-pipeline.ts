/**
 * Credit default pipeline
 * Train a model, publish it to the hosting service, score a sample
 * account, then optionally update and delete the service.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CREDIT_INPUT_SCHEMA,
  CREDIT_OUTPUT_SCHEMA,
  CreditRecord,
  LabeledCreditRecord,
  PredictionResponse,
  ServiceDescriptor,
  SwaggerDocument,
} from '@creditops/types';
import { PlatformConfig } from '@creditops/config';
import { Logger } from '@creditops/utils';
import {
  ClassificationMetrics,
  CreditModelTrainer,
  TrainingOptions,
  loadDataset,
  saveModel,
  toLabeledRecords,
  trainTestSplit,
} from '@creditops/ml';
import { DeployClient, ServiceHandle } from '@creditops/deploy-client';
import { CREDIT_DEFAULT_ADAPTER } from '../adapters';

export interface PipelineOptions {
  config: PlatformConfig;
  client: DeployClient;
  logger: Logger;
  serviceName: string;
  serviceVersion: string;
  /** Defaults to config.dataset.path */
  dataPath?: string;
  saveModelPath?: string;
  swaggerOutPath?: string;
  /** Retrain on the full dataset and swap the model in place */
  update?: boolean;
  /** Delete the service once done */
  remove?: boolean;
}

export interface PipelineResult {
  metrics: ClassificationMetrics;
  descriptor: ServiceDescriptor;
  sample: CreditRecord;
  prediction: PredictionResponse;
  swagger: SwaggerDocument;
  updated?: {
    descriptor: ServiceDescriptor;
    prediction: PredictionResponse;
  };
  deleted: boolean;
}

export function toCreditRecord(record: LabeledCreditRecord): CreditRecord {
  return {
    account_id: record.account_id,
    amount_6: record.amount_6,
    pur_6: record.pur_6,
    avg_pur_amt_6: record.avg_pur_amt_6,
    avg_interval_pur_6: record.avg_interval_pur_6,
    credit_limit: record.credit_limit,
    marital_status: record.marital_status,
    sex: record.sex,
    education: record.education,
    income: record.income,
    age: record.age,
  };
}

function trainingOptions(config: PlatformConfig): TrainingOptions {
  const { nRounds, learningRate, maxDepth, minSamplesLeaf, lambda, threshold } = config.training;
  return { nRounds, learningRate, maxDepth, minSamplesLeaf, lambda, threshold };
}

async function scoreOne(
  handle: ServiceHandle<CreditRecord, PredictionResponse>,
  record: CreditRecord
): Promise<PredictionResponse> {
  const { answer } = await handle.consume(record);
  const [prediction] = answer;
  if (!prediction) {
    throw new Error(`Service ${handle.name} version ${handle.version} returned an empty answer`);
  }
  return prediction;
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, client, logger, serviceName, serviceVersion } = options;
  const trainer = new CreditModelTrainer(logger.child('trainer'));

  // 1. Data
  const dataPath = path.resolve(options.dataPath ?? config.dataset.path);
  const table = await loadDataset(dataPath, { delimiter: config.dataset.delimiter });
  const records = toLabeledRecords(table, {
    idColumn: config.dataset.idColumn,
    targetColumn: config.dataset.targetColumn,
  });
  const { train, test } = trainTestSplit(records, {
    testFraction: config.training.testFraction,
    seed: config.training.seed,
  });
  logger.info('Dataset loaded', { path: dataPath, rows: records.length, train: train.length, test: test.length });

  // 2. Train and evaluate
  const model = trainer.train(train, trainingOptions(config));
  const metrics = trainer.evaluate(model, test);

  if (options.saveModelPath) {
    await saveModel(model, options.saveModelPath);
    logger.info('Model saved', { path: options.saveModelPath });
  }

  // 3. Publish, fetch and invoke
  await client.login(config.auth.username, config.auth.password);

  await client.publishService({
    name: serviceName,
    version: serviceVersion,
    adapter: CREDIT_DEFAULT_ADAPTER,
    model: model.toJSON(),
    inputs: CREDIT_INPUT_SCHEMA,
    outputs: CREDIT_OUTPUT_SCHEMA,
    description: 'Probability that a credit account defaults',
  });

  const handle = await client.getService<CreditRecord, PredictionResponse>(serviceName, serviceVersion);
  const sample = toCreditRecord(test[0]);
  const prediction = await scoreOne(handle, sample);
  logger.info('Sample account scored', { ...prediction });

  const swagger = await handle.swagger();
  if (options.swaggerOutPath) {
    await fs.mkdir(path.dirname(options.swaggerOutPath), { recursive: true });
    await fs.writeFile(options.swaggerOutPath, JSON.stringify(swagger, null, 2), 'utf-8');
    logger.info('Swagger document written', { path: options.swaggerOutPath });
  }

  const result: PipelineResult = {
    metrics,
    descriptor: handle.descriptor,
    sample,
    prediction,
    swagger,
    deleted: false,
  };

  // 4. Update in place
  if (options.update) {
    const retrained = trainer.train(records, trainingOptions(config));
    const updatedHandle = await client.updateService<CreditRecord, PredictionResponse>(serviceName, serviceVersion, {
      model: retrained.toJSON(),
      expectedRevision: handle.descriptor.revision,
    });
    const updatedPrediction = await scoreOne(updatedHandle, sample);
    logger.info('Sample account rescored after update', {
      revision: updatedHandle.descriptor.revision,
      ...updatedPrediction,
    });
    result.updated = { descriptor: updatedHandle.descriptor, prediction: updatedPrediction };
  }

  // 5. Delete
  if (options.remove) {
    await client.deleteService(serviceName, serviceVersion);
    result.deleted = true;
  }

  return result;
}
