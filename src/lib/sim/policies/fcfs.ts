import { byReadySinceThenId, pickMin } from "@/lib/sim/policies/order";
import { IDLE, type Decision, type PolicyInput } from "@/lib/sim/policies/types";

export function selectFCFS(input: PolicyInput): Decision {
  const next = pickMin(input.ready, byReadySinceThenId);
  if (!next) return IDLE;
  return { kind: "dispatch", id: next.id, allottedTicks: next.remainingTime };
}
