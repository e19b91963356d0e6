import { IDLE, type Decision, type PolicyInput } from "@/lib/sim/policies/types";

export function selectRR(input: PolicyInput, quantum: number): Decision {
  // Rotation order is the Ready order: head of the queue runs next.
  const head = input.ready[0];
  if (!head) return IDLE;
  return {
    kind: "dispatch",
    id: head.id,
    allottedTicks: Math.min(head.remainingTime, quantum),
  };
}
