import { byRemainingTime, pickMax, pickMin } from "@/lib/sim/policies/order";
import {
  IDLE,
  NO_PREEMPTION,
  type Decision,
  type PolicyInput,
  type Preemption,
} from "@/lib/sim/policies/types";

export function selectSJN(input: PolicyInput): Decision {
  const next = pickMin(input.ready, byRemainingTime);
  if (!next) return IDLE;
  return { kind: "dispatch", id: next.id, allottedTicks: next.remainingTime };
}

/** Shortest-remaining-time-first: same pick as SJN, but a strictly shorter job takes the CPU. */
export const selectSRTF = selectSJN;

export function shouldPreemptSRTF(input: PolicyInput): Preemption {
  const victim = pickMax(input.running, byRemainingTime);
  const challenger = pickMin(input.ready, byRemainingTime);
  if (victim && challenger && challenger.remainingTime < victim.remainingTime) {
    return { preempt: true, by: challenger.id, victim: victim.id };
  }
  return NO_PREEMPTION;
}
