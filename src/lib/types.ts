export type Algorithm = "FCFS" | "SJN" | "PRIORITY" | "RR" | "SRTF";
export type PolicyKind = "FCFS" | "SJN" | "SRTF" | "RR" | "PRIORITY_P" | "PRIORITY_NP";
export type OptimizeFor = "throughput" | "responsiveness" | "fairness";
export type ProcessRuntimeState = "NEW" | "READY" | "RUNNING" | "TERMINATED";

export type ProcessId = number;

export const IDLE_LABEL = "IDLE";

export function pidLabel(id: ProcessId): string {
  return `P${id}`;
}

export interface ProcessInput {
  id: ProcessId;
  arrivalTime: number;
  burstTime: number;
  priority?: number;
}

export interface ProcessDescriptor {
  readonly id: ProcessId;
  readonly arrivalTime: number;
  readonly burstTime: number;
  /** Lower value is more urgent. */
  readonly priority: number;
}

export interface ProcessRuntime {
  id: ProcessId;
  remainingTime: number;
  state: ProcessRuntimeState;
  firstRunTime: number | null;
  completionTime: number | null;
  readySince: number | null;
}

export type PolicyConfig =
  | { kind: "FCFS" }
  | { kind: "SJN" }
  | { kind: "SRTF" }
  | { kind: "RR"; quantum: number }
  | { kind: "PRIORITY_P" }
  | { kind: "PRIORITY_NP" };

export interface SimulationSettings {
  algorithm: Algorithm;
  preemptive?: boolean;
  quantum?: number;
  /** Number of processors; 1 when omitted. */
  cpus?: number;
}

export type TransitionReason = "time_slice" | "preempted";

export interface SimEvent {
  t: number;
  id: ProcessId;
  from: ProcessRuntimeState;
  to: ProcessRuntimeState;
  reason?: TransitionReason;
  /** Set on preemptions: the Ready process that forced the switch. */
  by?: ProcessId;
}

export interface SimulationRun {
  policy: PolicyConfig;
  descriptors: ProcessDescriptor[];
  runtimes: ProcessRuntime[];
  cpus: number;
  totalTicks: number;
  /** CPU-ticks spent executing, summed over every processor. */
  busyTicks: number;
  idleTicks: number;
  /** One lane per CPU, one label per tick: `P<id>` or `IDLE`. */
  gantt: string[][];
  events: SimEvent[];
  dispatches: number;
  contextSwitches: number;
  preemptions: number;
}

export interface ProcessMetrics {
  id: ProcessId;
  arrivalTime: number;
  burstTime: number;
  priority: number;
  firstRunTime: number;
  completionTime: number;
  waitingTime: number;
  turnaroundTime: number;
  responseTime: number;
}

export interface AverageMetrics {
  waitingTime: number;
  turnaroundTime: number;
  responseTime: number;
}

export interface SimulationReport {
  readonly policy: PolicyConfig;
  readonly processes: readonly ProcessMetrics[];
  readonly averages: AverageMetrics;
  readonly cpuUtilization: number;
  readonly throughput: number;
  readonly makespan: number;
  readonly cpus: number;
  readonly totalTicks: number;
  readonly busyTicks: number;
  readonly idleTicks: number;
  readonly contextSwitches: number;
  readonly preemptions: number;
  readonly gantt: readonly (readonly string[])[];
  readonly events: readonly SimEvent[];
  readonly eventLog: readonly string[];
}
