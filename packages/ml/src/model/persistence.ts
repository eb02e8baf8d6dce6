import * as fs from 'fs/promises';
import * as path from 'path';
import { MLError, MLErrorCode } from '@creditops/types';
import { CreditDefaultModel } from './CreditDefaultModel';

export async function saveModel(model: CreditDefaultModel, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(model.toJSON(), null, 2), 'utf-8');
}

export async function loadModel(filePath: string): Promise<CreditDefaultModel> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MLError(MLErrorCode.MODEL_NOT_FOUND, `No model file at ${filePath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new MLError(MLErrorCode.INVALID_MODEL, `Model file ${filePath} is not valid JSON`, error);
  }
  return CreditDefaultModel.fromJSON(parsed);
}
