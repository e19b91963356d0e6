import { computeFairness, type FairnessMetrics } from "@/lib/compare/fairness";
import { paretoFront, type Objective } from "@/lib/compare/pareto";
import { DEFAULT_QUANTUM, describePolicy, policyConfigFor } from "@/lib/config";
import { POLICY_KINDS } from "@/lib/sim/policies";
import { createSimulation } from "@/lib/sim/simulation";
import type { OptimizeFor, PolicyConfig, PolicyKind, ProcessInput, SimulationReport } from "@/lib/types";

export type { FairnessMetrics } from "@/lib/compare/fairness";
export { dominates, paretoFront, type Objective, type ObjectiveDirection } from "@/lib/compare/pareto";

export type ComparisonRow = {
  policy: PolicyConfig;
  label: string;
  report: SimulationReport;
  fairness: FairnessMetrics;
};

export type CompareOptions = {
  policies?: readonly PolicyKind[];
  quantum?: number;
  cpus?: number;
};

export const COMPARISON_OBJECTIVES: ReadonlyArray<Objective<ComparisonRow>> = [
  { key: "avgWaitingTime", direction: "min", value: (row) => row.report.averages.waitingTime },
  { key: "avgTurnaroundTime", direction: "min", value: (row) => row.report.averages.turnaroundTime },
  { key: "avgResponseTime", direction: "min", value: (row) => row.report.averages.responseTime },
  { key: "makespan", direction: "min", value: (row) => row.report.makespan },
  { key: "cpuUtilization", direction: "max", value: (row) => row.report.cpuUtilization },
  { key: "throughput", direction: "max", value: (row) => row.report.throughput },
];

/**
 * Runs every requested policy over the same input. Each run gets its own
 * store and engine; nothing is shared between them.
 */
export function comparePolicies(processes: readonly ProcessInput[], options: CompareOptions = {}): ComparisonRow[] {
  const kinds = options.policies ?? POLICY_KINDS;
  const quantum = options.quantum ?? DEFAULT_QUANTUM;

  return kinds.map((kind) => {
    const report = createSimulation(processes, policyConfigFor(kind, quantum), { cpus: options.cpus }).run();
    return {
      policy: report.policy,
      label: describePolicy(report.policy),
      report,
      fairness: computeFairness(report),
    };
  });
}

export function comparisonFront(rows: readonly ComparisonRow[]): ComparisonRow[] {
  return paretoFront(rows, COMPARISON_OBJECTIVES);
}

type Criterion = (left: ComparisonRow, right: ComparisonRow) => number;

const lower =
  (value: (row: ComparisonRow) => number): Criterion =>
  (left, right) =>
    value(left) - value(right);

const higher =
  (value: (row: ComparisonRow) => number): Criterion =>
  (left, right) =>
    value(right) - value(left);

const CRITERIA: Record<OptimizeFor, Criterion[]> = {
  throughput: [
    lower((row) => row.report.makespan),
    higher((row) => row.report.throughput),
    higher((row) => row.report.cpuUtilization),
  ],
  responsiveness: [
    lower((row) => row.report.averages.responseTime),
    lower((row) => row.report.averages.waitingTime),
    lower((row) => row.report.averages.turnaroundTime),
  ],
  fairness: [
    lower((row) => row.report.averages.turnaroundTime),
    lower((row) => row.report.averages.waitingTime),
    lower((row) => row.report.averages.responseTime),
  ],
};

function kindOrder(row: ComparisonRow): number {
  return POLICY_KINDS.indexOf(row.policy.kind);
}

export function rankPolicies(rows: readonly ComparisonRow[], optimizeFor: OptimizeFor): ComparisonRow[] {
  const criteria = CRITERIA[optimizeFor];
  return [...rows].sort((left, right) => {
    for (const criterion of criteria) {
      const result = criterion(left, right);
      if (result !== 0) return result;
    }
    return kindOrder(left) - kindOrder(right);
  });
}
