import { pidLabel, type PolicyConfig, type SimEvent } from "@/lib/types";

function reasonSuffix(event: SimEvent, policy: PolicyConfig): string {
  if (event.reason === "time_slice") {
    return policy.kind === "RR" ? ` (time slice, q=${policy.quantum})` : " (time slice)";
  }
  if (event.reason === "preempted") {
    return event.by === undefined ? " (preempted)" : ` (preempted by ${pidLabel(event.by)})`;
  }
  return "";
}

export function formatEvent(event: SimEvent, policy: PolicyConfig): string {
  return `t=${event.t}: ${pidLabel(event.id)} ${event.from} -> ${event.to}${reasonSuffix(event, policy)}`;
}

export function formatEventLog(events: readonly SimEvent[], policy: PolicyConfig): string[] {
  return events.map((event) => formatEvent(event, policy));
}
