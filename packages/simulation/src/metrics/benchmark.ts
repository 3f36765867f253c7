import type { PerformanceMetrics } from './performance-metrics.js';

export interface BenchmarkComparison {
  strategyAnnualReturn: number;
  benchmarkAnnualReturn: number;
  excessReturn: number;
  outperformed: boolean;
}

export const DEFAULT_BENCHMARK_ANNUAL_RETURN = 0.08;

export function compareWithBenchmark(
  metrics: Pick<PerformanceMetrics, 'annualReturn'>,
  benchmarkAnnualReturn: number = DEFAULT_BENCHMARK_ANNUAL_RETURN
): BenchmarkComparison {
  const excessReturn = metrics.annualReturn - benchmarkAnnualReturn;
  return {
    strategyAnnualReturn: metrics.annualReturn,
    benchmarkAnnualReturn,
    excessReturn,
    outperformed: excessReturn > 0,
  };
}
