import { byPriority, pickMax, pickMin } from "@/lib/sim/policies/order";
import {
  IDLE,
  NO_PREEMPTION,
  type Decision,
  type PolicyInput,
  type Preemption,
} from "@/lib/sim/policies/types";

export function selectPriority(input: PolicyInput): Decision {
  const next = pickMin(input.ready, byPriority);
  if (!next) return IDLE;
  return { kind: "dispatch", id: next.id, allottedTicks: next.remainingTime };
}

export function shouldPreemptPriority(input: PolicyInput): Preemption {
  const victim = pickMax(input.running, byPriority);
  const challenger = pickMin(input.ready, byPriority);
  if (victim && challenger && challenger.priority < victim.priority) {
    return { preempt: true, by: challenger.id, victim: victim.id };
  }
  return NO_PREEMPTION;
}
