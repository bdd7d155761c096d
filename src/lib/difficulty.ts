import { accuracy, clampDifficulty } from './item';
import { mean, sampleVariance } from './history';
import type { ConfidenceLevel, Item, ReviewOutcome } from './types';

export interface PerformanceMetrics {
  /** Seconds; estimated from difficulty and accuracy when no timings exist. */
  averageResponseTime: number;
  accuracyRate: number;
  consistencyScore: number;
  /** Latest half of the trend window minus the earlier half, in [-1, 1]. */
  recentTrend: number;
  confidenceTrend: number;
}

export interface AdjustmentWeights {
  accuracy: number;
  responseTime: number;
  confidence: number;
  trend: number;
  consistency: number;
}

export interface DifficultyAdapterOptions {
  fastResponseSeconds: number;
  slowResponseSeconds: number;
  highAccuracy: number;
  lowAccuracy: number;
  minimumReviews: number;
  maximumChange: number;
  trendWindow: number;
  weights: AdjustmentWeights;
}

export interface AdjustmentFactors {
  accuracy: number;
  responseTime: number;
  confidence: number;
  trend: number;
  consistency: number;
}

export interface DifficultyProposal {
  previous: number;
  difficulty: number;
  delta: number;
  rationale: string;
  metrics: PerformanceMetrics;
  factors: AdjustmentFactors;
  sufficientHistory: boolean;
}

export type DifficultyAdapterConfig = Partial<Omit<DifficultyAdapterOptions, 'weights'>> & {
  weights?: Partial<AdjustmentWeights>;
};

export const DEFAULT_ADAPTER_OPTIONS: Readonly<DifficultyAdapterOptions> = {
  fastResponseSeconds: 3,
  slowResponseSeconds: 10,
  highAccuracy: 0.85,
  lowAccuracy: 0.6,
  minimumReviews: 3,
  maximumChange: 0.2,
  trendWindow: 10,
  weights: { accuracy: 0.3, responseTime: 0.4, confidence: 0.3, trend: 0.1, consistency: 0.1 },
};

const CONFIDENCE_ADJUSTMENT: Record<ConfidenceLevel, number> = {
  1: -0.15,
  2: -0.05,
  3: 0,
  4: 0.05,
  5: 0.15,
};

const STABLE_MESSAGE = 'Difficulty maintained - performance is stable';
const NOT_ENOUGH_HISTORY = 'Difficulty unchanged - not enough reviews to judge yet';

function binary(outcomes: readonly ReviewOutcome[]): number[] {
  return outcomes.map((outcome) => (outcome.correct ? 1 : 0));
}

export class DifficultyAdapter {
  private readonly options: DifficultyAdapterOptions;

  constructor(options: DifficultyAdapterConfig = {}) {
    this.options = {
      ...DEFAULT_ADAPTER_OPTIONS,
      ...options,
      weights: { ...DEFAULT_ADAPTER_OPTIONS.weights, ...options.weights },
    };
  }

  get minimumReviews(): number {
    return this.options.minimumReviews;
  }

  analyze(item: Item, recent: readonly ReviewOutcome[] = []): PerformanceMetrics {
    const accuracyRate = accuracy(item);

    if (item.reviewCount < this.options.minimumReviews) {
      return {
        averageResponseTime: 5,
        accuracyRate,
        consistencyScore: 0.5,
        recentTrend: 0,
        confidenceTrend: 0,
      };
    }

    return {
      averageResponseTime: this.estimateResponseTime(item, accuracyRate),
      accuracyRate,
      consistencyScore: this.consistency(accuracyRate, recent),
      recentTrend: this.trend(recent),
      confidenceTrend: this.confidenceTrend(item, accuracyRate),
    };
  }

  propose(item: Item, recent: readonly ReviewOutcome[] = [], confidence?: ConfidenceLevel | null): DifficultyProposal {
    const current = item.difficulty;
    const metrics = this.analyze(item, recent);

    if (item.reviewCount < this.options.minimumReviews) {
      return {
        previous: current,
        difficulty: current,
        delta: 0,
        rationale: NOT_ENOUGH_HISTORY,
        metrics,
        factors: { accuracy: 0, responseTime: 0, confidence: 0, trend: 0, consistency: 0 },
        sufficientHistory: false,
      };
    }

    const factors: AdjustmentFactors = {
      accuracy: this.accuracyFactor(metrics.accuracyRate),
      responseTime: this.responseTimeFactor(metrics.averageResponseTime),
      confidence: confidence ? CONFIDENCE_ADJUSTMENT[confidence] : 0,
      trend: metrics.recentTrend * 0.1,
      consistency: this.consistencyFactor(metrics.consistencyScore),
    };

    const { weights, maximumChange } = this.options;
    const adjustment =
      factors.accuracy * weights.accuracy +
      factors.responseTime * weights.responseTime +
      factors.confidence * weights.confidence +
      factors.trend * weights.trend +
      factors.consistency * weights.consistency;

    let next = clampDifficulty(current + adjustment);
    if (Math.abs(next - current) > maximumChange) {
      next = next > current ? current + maximumChange : current - maximumChange;
    }

    return {
      previous: current,
      difficulty: next,
      delta: next - current,
      rationale: this.explain(current, next, metrics),
      metrics,
      factors,
      sufficientHistory: true,
    };
  }

  /** Whether a proposal is worth applying; callers must not apply one when this is false. */
  shouldAdjust(item: Item, metrics: PerformanceMetrics): boolean {
    const o = this.options;
    if (item.reviewCount < o.minimumReviews) return false;

    if (metrics.accuracyRate > o.highAccuracy || metrics.accuracyRate < o.lowAccuracy) return true;
    if (Math.abs(metrics.recentTrend) > 0.2) return true;

    return metrics.averageResponseTime < o.fastResponseSeconds || metrics.averageResponseTime > o.slowResponseSeconds;
  }

  explain(previous: number, next: number, metrics: PerformanceMetrics): string {
    const change = next - previous;
    if (Math.abs(change) <= 0.01) return STABLE_MESSAGE;

    const direction = change > 0 ? 'increased' : 'decreased';
    const size = Math.abs(change);
    const magnitude = size < 0.1 ? 'slightly' : size < 0.2 ? 'moderately' : 'significantly';

    const reasons: string[] = [];
    if (metrics.accuracyRate > this.options.highAccuracy) reasons.push('high accuracy');
    else if (metrics.accuracyRate < this.options.lowAccuracy) reasons.push('low accuracy');

    if (metrics.averageResponseTime < this.options.fastResponseSeconds) reasons.push('fast response times');
    else if (metrics.averageResponseTime > this.options.slowResponseSeconds) reasons.push('slow response times');

    if (metrics.recentTrend > 0.1) reasons.push('improving performance');
    else if (metrics.recentTrend < -0.1) reasons.push('declining performance');

    const because = reasons.length > 0 ? reasons.join(', ') : 'overall performance patterns';
    return `Difficulty ${direction} ${magnitude} based on ${because}`;
  }

  private estimateResponseTime(item: Item, accuracyRate: number): number {
    if (item.responseTimes.length > 0) {
      return mean(item.responseTimes);
    }
    const base = 5;
    return base * (1 + item.difficulty * 2) * (2 - accuracyRate);
  }

  private consistency(accuracyRate: number, recent: readonly ReviewOutcome[]): number {
    if (recent.length < 3) {
      return Math.min(accuracyRate * 1.2, 1);
    }
    const variance = sampleVariance(binary(recent.slice(-10)));
    return Math.max(0, 1 - variance);
  }

  private trend(recent: readonly ReviewOutcome[]): number {
    const size = this.options.trendWindow;
    if (size < 2 || recent.length < size) return 0;

    const window = binary(recent.slice(-size));
    const half = Math.floor(window.length / 2);
    return mean(window.slice(half)) - mean(window.slice(0, half));
  }

  private confidenceTrend(item: Item, accuracyRate: number): number {
    if (accuracyRate > 0.8 && item.reviewCount >= 5) return 0.2;
    if (accuracyRate < 0.5) return -0.2;
    return 0;
  }

  private accuracyFactor(rate: number): number {
    if (rate > this.options.highAccuracy) return (rate - this.options.highAccuracy) * 0.5;
    if (rate < this.options.lowAccuracy) return (rate - this.options.lowAccuracy) * 0.5;
    return (rate - 0.75) * 0.1;
  }

  private responseTimeFactor(seconds: number): number {
    if (seconds < this.options.fastResponseSeconds) return 0.1;
    if (seconds > this.options.slowResponseSeconds) return -0.1;
    return 0;
  }

  private consistencyFactor(score: number): number {
    if (score > 0.8) return 0.05;
    if (score < 0.4) return -0.05;
    return 0;
  }
}
