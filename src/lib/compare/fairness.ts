import type { SimulationReport } from "@/lib/types";

export type FairnessMetrics = {
  maxWaitingTime: number;
  p95WaitingTime: number;
  waitingTimeStd: number;
  starvation: boolean;
  starvationThreshold: number;
};

const MIN_STARVATION_THRESHOLD = 10;

export function populationStd(values: readonly number[]): number {
  if (!values.length) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function nearestRankPercentile(values: readonly number[], q: number): number {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil((q / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, rank))];
}

export function computeFairness(report: SimulationReport): FairnessMetrics {
  const waits = report.processes.map((row) => row.waitingTime);
  const threshold = Math.max(2 * report.averages.waitingTime, MIN_STARVATION_THRESHOLD);
  const maxWaitingTime = waits.length ? Math.max(...waits) : 0;

  return {
    maxWaitingTime,
    p95WaitingTime: nearestRankPercentile(waits, 95),
    waitingTimeStd: populationStd(waits),
    starvation: waits.length > 0 && maxWaitingTime >= threshold,
    starvationThreshold: threshold,
  };
}
