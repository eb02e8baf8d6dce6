/**
 * Shared fixtures for hosting service tests
 */

import * as path from 'path';
import { PlatformConfig } from '@creditops/config';
import { CreditRecord, LabeledCreditRecord } from '@creditops/types';
import { Logger } from '@creditops/utils';
import { CreditDefaultModel, CreditModelTrainer, loadDataset, toLabeledRecords } from '@creditops/ml';

export const DATASET_PATH = path.resolve(__dirname, '../../data/credit_default.csv');

export const TEST_USERNAME = 'operator';
export const TEST_PASSWORD = 'test-password';

export function quietLogger(name: string): Logger {
  return new Logger(name, { level: 'error' });
}

export function testConfig(options: { immutableVersions?: boolean; rateLimitMax?: number } = {}): PlatformConfig {
  return {
    environment: 'test',
    core: { name: 'creditops', version: '1.0.0', logLevel: 'error' },
    server: { host: '127.0.0.1', port: 0, rateLimitMax: options.rateLimitMax ?? 1000, rateLimitWindow: '1 minute' },
    auth: {
      username: TEST_USERNAME,
      password: TEST_PASSWORD,
      jwtSecret: 'test-secret-for-signing',
      tokenTtlSeconds: 600,
    },
    registry: { immutableVersions: options.immutableVersions ?? false },
    dataset: {
      path: DATASET_PATH,
      idColumn: 'account_id',
      targetColumn: 'bad_ind',
      delimiter: ',',
    },
    training: {
      nRounds: 8,
      learningRate: 0.2,
      maxDepth: 3,
      minSamplesLeaf: 5,
      lambda: 1,
      threshold: 0.5,
      testFraction: 0.25,
      seed: 42,
    },
    client: { baseUrl: 'http://127.0.0.1:3001', timeoutMs: 5000 },
  };
}

export async function loadRecords(): Promise<LabeledCreditRecord[]> {
  return toLabeledRecords(await loadDataset(DATASET_PATH));
}

/**
 * Two distinct models: one fit on the first 80 rows, one on every row
 */
export async function trainModels(): Promise<{ first: CreditDefaultModel; second: CreditDefaultModel }> {
  const records = await loadRecords();
  const trainer = new CreditModelTrainer(quietLogger('trainer'));
  return {
    first: trainer.train(records.slice(0, 80), { nRounds: 5 }),
    second: trainer.train(records, { nRounds: 10, maxDepth: 2 }),
  };
}

export const SAMPLE_ACCOUNT: CreditRecord = {
  account_id: 'acct-1001',
  amount_6: 2450.5,
  pur_6: 12,
  avg_pur_amt_6: 204.21,
  avg_interval_pur_6: 14,
  credit_limit: 18.5,
  marital_status: 'single',
  sex: 'female',
  education: 'graduate',
  income: 41.2,
  age: 33,
};
