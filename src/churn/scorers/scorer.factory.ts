import { Logger } from '@nestjs/common';
import { existsSync, readFileSync } from 'fs';
import type { ChurnScorer } from '../interfaces/churn.interface';
import { LogisticChurnModel } from './logistic-model';
import { LogisticModelScorer } from './logistic-model.scorer';
import { RuleBasedScorer } from './rule-based.scorer';

const logger = new Logger('ChurnScorerFactory');

/**
 * Pick the scorer: a trained model when a readable model file is configured,
 * the rule set otherwise.
 */
export function createChurnScorer(modelPath?: string): ChurnScorer {
  if (!modelPath) {
    return new RuleBasedScorer();
  }

  if (!existsSync(modelPath)) {
    logger.warn(
      `No trained model found at ${modelPath}. Using rule-based scoring.`,
    );
    return new RuleBasedScorer();
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(modelPath, 'utf8'));
    const model = LogisticChurnModel.fromJSON(raw);
    logger.log(`Loaded churn model ${model.version} from ${modelPath}`);
    return new LogisticModelScorer(model);
  } catch (error: unknown) {
    const errorMessage =
      error instanceof Error ? error.message : 'Unknown error';
    logger.warn(
      `Invalid churn model at ${modelPath}, using rule-based scoring: ${errorMessage}`,
    );
    return new RuleBasedScorer();
  }
}
