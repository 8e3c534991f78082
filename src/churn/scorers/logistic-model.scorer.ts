import {
  ChurnPrediction,
  ChurnScorer,
  FeatureVector,
  normalizeProbability,
  toRiskLevel,
} from '../interfaces/churn.interface';
import { LogisticChurnModel } from './logistic-model';

/** Scores with a trained model instead of the fixed rule set */
export class LogisticModelScorer implements ChurnScorer {
  readonly name: string;

  constructor(private readonly model: LogisticChurnModel) {
    this.name = `model:${model.version}`;
  }

  score(features: FeatureVector): ChurnPrediction {
    const churnProbability = normalizeProbability(
      this.model.predictProbability(features),
    );
    return { churnProbability, riskLevel: toRiskLevel(churnProbability) };
  }
}
