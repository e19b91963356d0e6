import type { PolicyConfig, ProcessId } from "@/lib/types";

export type ReadyEntry = {
  id: ProcessId;
  arrivalTime: number;
  priority: number;
  remainingTime: number;
  readySince: number;
};

export type RunningEntry = ReadyEntry & {
  cpu: number;
  /** Ticks left in the current allotment. */
  sliceLeft: number;
};

export type PolicyInput = {
  tick: number;
  /** Ready processes in the order they (re-)entered Ready. */
  ready: readonly ReadyEntry[];
  /** Occupied CPUs, in CPU order. */
  running: readonly RunningEntry[];
  config: PolicyConfig;
};

export type Decision =
  | { kind: "dispatch"; id: ProcessId; allottedTicks: number }
  | { kind: "idle" };

/** `victim` gives up its CPU to `by`. */
export type Preemption = { preempt: false } | { preempt: true; by: ProcessId; victim: ProcessId };

export const IDLE: Decision = { kind: "idle" };

export const NO_PREEMPTION: Preemption = { preempt: false };
