import { CREDIT_INPUT_SCHEMA, CREDIT_OUTPUT_SCHEMA } from '@creditops/types';
import { CreditDefaultModel, creditDefaultAdapter } from '@creditops/ml';
import { defineAdapter } from '../services/adapter-catalog';

export const CREDIT_DEFAULT_ADAPTER = 'credit-default';

export const creditDefaultAdapterDefinition = defineAdapter({
  name: CREDIT_DEFAULT_ADAPTER,
  description: 'Scores the probability that one credit account defaults',
  inputs: CREDIT_INPUT_SCHEMA,
  outputs: CREDIT_OUTPUT_SCHEMA,
  loadModel: (artifact) => CreditDefaultModel.fromJSON(artifact),
  adapt: creditDefaultAdapter,
});
