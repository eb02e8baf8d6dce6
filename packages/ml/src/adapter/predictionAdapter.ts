import { CreditRecord, MLError, MLErrorCode, PredictionResponse } from '@creditops/types';
import { ModelInputRow, ScoringModel } from '../model/types';

export type PredictionAdapter<Input, Output, Model> = (input: Input, model: Model) => Output;

/**
 * Scores one account. The record is passed through to the model as is;
 * a missing or mistyped field fails inside the model call.
 */
export const creditDefaultAdapter: PredictionAdapter<CreditRecord, PredictionResponse, ScoringModel> = (
  record,
  model
) => {
  const frame: ModelInputRow[] = [
    {
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
    },
  ];

  const [scored] = model.score(frame);
  if (!scored) {
    throw new MLError(MLErrorCode.PREDICTION_FAILED, `Model ${model.id} returned no rows`);
  }

  return {
    account_id: record.account_id,
    scored_label: scored.ScoredLabels,
    scored_prob: scored.ScoredProbabilities,
  };
};
