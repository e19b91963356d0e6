import { selectFCFS } from "@/lib/sim/policies/fcfs";
import { selectPriority, shouldPreemptPriority } from "@/lib/sim/policies/priority";
import { selectRR } from "@/lib/sim/policies/rr";
import { selectSJN, selectSRTF, shouldPreemptSRTF } from "@/lib/sim/policies/sjn";
import { NO_PREEMPTION, type Decision, type PolicyInput, type Preemption } from "@/lib/sim/policies/types";
import type { PolicyKind } from "@/lib/types";

export * from "@/lib/sim/policies/types";

export const POLICY_KINDS: readonly PolicyKind[] = ["FCFS", "SJN", "SRTF", "RR", "PRIORITY_P", "PRIORITY_NP"];

const PREEMPTIVE: ReadonlySet<PolicyKind> = new Set<PolicyKind>(["SRTF", "PRIORITY_P"]);

export function isPreemptive(kind: PolicyKind): boolean {
  return PREEMPTIVE.has(kind);
}

function assertNever(value: never): never {
  throw new Error(`unhandled policy: ${JSON.stringify(value)}`);
}

export function selectNext(input: PolicyInput): Decision {
  const { config } = input;
  switch (config.kind) {
    case "FCFS":
      return selectFCFS(input);
    case "SJN":
      return selectSJN(input);
    case "SRTF":
      return selectSRTF(input);
    case "RR":
      return selectRR(input, config.quantum);
    case "PRIORITY_P":
    case "PRIORITY_NP":
      return selectPriority(input);
    default:
      return assertNever(config);
  }
}

export function shouldPreempt(input: PolicyInput): Preemption {
  const { config } = input;
  switch (config.kind) {
    case "SRTF":
      return shouldPreemptSRTF(input);
    case "PRIORITY_P":
      return shouldPreemptPriority(input);
    case "FCFS":
    case "SJN":
    case "RR":
    case "PRIORITY_NP":
      return NO_PREEMPTION;
    default:
      return assertNever(config);
  }
}
