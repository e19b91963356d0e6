export * from "@/lib/types";
export * from "@/lib/errors";
export {
  DEFAULT_CPUS,
  DEFAULT_QUANTUM,
  derivePolicyConfig,
  describePolicy,
  parseAlgorithm,
  policyConfigFor,
  toSettings,
  validateCpuCount,
  validatePolicyConfig,
  validateQuantum,
} from "@/lib/config";

export { ProcessStore } from "@/lib/sim/processStore";
export { SchedulerEngine, type EngineOptions } from "@/lib/sim/engine";
export {
  POLICY_KINDS,
  isPreemptive,
  selectNext,
  shouldPreempt,
  type Decision,
  type PolicyInput,
  type Preemption,
  type ReadyEntry,
  type RunningEntry,
} from "@/lib/sim/policies";
export { buildReport, computeAverages, computeProcessMetrics } from "@/lib/sim/metrics";
export { formatEvent, formatEventLog } from "@/lib/sim/events";
export {
  Simulation,
  createSimulation,
  simulate,
  type PolicySelection,
  type SimulationOptions,
} from "@/lib/sim/simulation";

export { generateWorkload, type WorkloadOptions } from "@/lib/workload";
export {
  COMPARISON_OBJECTIVES,
  comparePolicies,
  comparisonFront,
  rankPolicies,
  type CompareOptions,
  type ComparisonRow,
  type FairnessMetrics,
} from "@/lib/compare";
export {
  TimelineAnalytics,
  buildSegments,
  buildTimelineAnalytics,
  clampTickRange,
  type RangeStats,
  type Segment,
  type TickRange,
} from "@/lib/analytics/timelineAnalytics";
export { deriveProcessStates, deriveReadyQueue } from "@/lib/sim/deriveProcessStates";
export { headlineEvent, type HeadlineEvent } from "@/lib/sim/headlineEvent";
export { getReplayMax, getReplayView, type ReplayView } from "@/lib/replay";
export { createReplayStore, type ReplayStore, type ReplayStoreApi } from "@/store/replayStore";
