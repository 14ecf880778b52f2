import type { ForecasterKind } from '../infra/config';
import type { HintValue } from '../pipeline/types';

/** Advisory gas-trend input. A forecaster can only delay a cycle, never trigger a trade. */
export interface GasForecaster {
  ingestGas(gwei: number): void;
  shouldWait(): boolean;
}

export type Recommendation = {
  confidence: number;
  hints: Record<string, HintValue>;
};

export interface ExecutionOptimizer {
  recommend(chainId: number, riskLevel: number): Recommendation;
}

export class NoopForecaster implements GasForecaster {
  ingestGas(): void {}

  shouldWait(): boolean {
    return false;
  }
}

/** Waits while the newest sample sits `riseRatio` above the rolling mean. */
export class TrendForecaster implements GasForecaster {
  private readonly samples: number[] = [];

  constructor(
    private readonly window = 12,
    private readonly riseRatio = 1.25,
  ) {}

  ingestGas(gwei: number): void {
    if (!Number.isFinite(gwei) || gwei <= 0) return;
    this.samples.push(gwei);
    if (this.samples.length > this.window) this.samples.shift();
  }

  shouldWait(): boolean {
    if (this.samples.length < 3) return false;
    const latest = this.samples[this.samples.length - 1];
    const mean = this.samples.reduce((sum, v) => sum + v, 0) / this.samples.length;
    return latest > mean * this.riseRatio;
  }
}

export class StaticOptimizer implements ExecutionOptimizer {
  constructor(private readonly confidence = 0.9) {}

  recommend(): Recommendation {
    return { confidence: this.confidence, hints: {} };
  }
}

export function createForecaster(kind: ForecasterKind): GasForecaster {
  return kind === 'trend' ? new TrendForecaster() : new NoopForecaster();
}
