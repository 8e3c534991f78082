import { z } from 'zod';
import type { FeatureVector } from '../interfaces/churn.interface';

export const MODEL_FEATURES = [
  'recencyDays',
  'frequency',
  'monetary',
  'avgTransaction',
  'engagementScore',
  'accountAgeDays',
  'supportTickets',
] as const satisfies readonly (keyof FeatureVector)[];

const modelFeatureSchema = z.enum(MODEL_FEATURES);

export const ChurnModelSchema = z
  .object({
    version: z.string().min(1),
    featureNames: z.array(modelFeatureSchema).min(1),
    means: z.array(z.number()),
    scales: z.array(z.number().positive()),
    weights: z.array(z.number()),
    intercept: z.number(),
  })
  .refine(
    (m) =>
      m.means.length === m.featureNames.length &&
      m.scales.length === m.featureNames.length &&
      m.weights.length === m.featureNames.length,
    { message: 'means, scales and weights must match featureNames' },
  );

export type ChurnModelParams = z.infer<typeof ChurnModelSchema>;

export interface FitOptions {
  epochs?: number;
  learningRate?: number;
  version?: string;
}

/**
 * Logistic regression over standardised features. Training is plain batch
 * gradient descent from zero weights, so fitting the same data twice gives
 * the same model.
 */
export class LogisticChurnModel {
  private constructor(private readonly params: ChurnModelParams) {}

  static fromJSON(raw: unknown): LogisticChurnModel {
    return new LogisticChurnModel(ChurnModelSchema.parse(raw));
  }

  static fit(
    samples: FeatureVector[],
    labels: number[],
    options: FitOptions = {},
  ): LogisticChurnModel {
    if (samples.length === 0 || samples.length !== labels.length) {
      throw new Error(
        'Training needs one label per sample and at least one sample',
      );
    }

    const epochs = options.epochs ?? 500;
    const learningRate = options.learningRate ?? 0.1;
    const featureNames = [...MODEL_FEATURES];
    const n = samples.length;

    const columns = featureNames.map((name) => samples.map((s) => s[name]));
    const means = columns.map((col) => col.reduce((a, b) => a + b, 0) / n);
    const scales = columns.map((col, i) => {
      const variance =
        col.reduce((acc, v) => acc + (v - means[i]) ** 2, 0) / n;
      const std = Math.sqrt(variance);
      return std > 0 ? std : 1;
    });
    const rows = samples.map((s) =>
      featureNames.map((name, i) => (s[name] - means[i]) / scales[i]),
    );

    const weights = new Array<number>(featureNames.length).fill(0);
    let intercept = 0;

    for (let epoch = 0; epoch < epochs; epoch++) {
      const gradW = new Array<number>(featureNames.length).fill(0);
      let gradB = 0;

      rows.forEach((row, r) => {
        const error = sigmoid(dot(weights, row) + intercept) - labels[r];
        row.forEach((x, i) => {
          gradW[i] += error * x;
        });
        gradB += error;
      });

      for (let i = 0; i < weights.length; i++) {
        weights[i] -= (learningRate * gradW[i]) / n;
      }
      intercept -= (learningRate * gradB) / n;
    }

    return new LogisticChurnModel({
      version: options.version ?? new Date().toISOString(),
      featureNames,
      means,
      scales,
      weights,
      intercept,
    });
  }

  get version(): string {
    return this.params.version;
  }

  predictProbability(features: FeatureVector): number {
    const { featureNames, means, scales, weights, intercept } = this.params;
    const row = featureNames.map(
      (name, i) => (features[name] - means[i]) / scales[i],
    );
    return sigmoid(dot(weights, row) + intercept);
  }

  toJSON(): ChurnModelParams {
    return { ...this.params };
  }
}

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, v, i) => sum + v * b[i], 0);
}
