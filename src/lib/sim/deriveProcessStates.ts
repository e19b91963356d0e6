import { pidLabel, type ProcessId, type ProcessRuntimeState, type SimulationReport } from "@/lib/types";

/**
 * State of every process while tick `t` executes, keyed by `P<id>`.
 * Replays the event stream up to and including boundary `t`.
 */
export function deriveProcessStates(report: SimulationReport, t: number): Record<string, ProcessRuntimeState> {
  const out: Record<string, ProcessRuntimeState> = {};
  for (const row of report.processes) out[pidLabel(row.id)] = "NEW";

  for (const event of report.events) {
    if (event.t > t) break;
    out[pidLabel(event.id)] = event.to;
  }

  return out;
}

/**
 * Ready queue, in rotation order, while tick `t` executes. Rebuilt from the
 * READY entries and exits recorded up to boundary `t`.
 */
export function deriveReadyQueue(report: Pick<SimulationReport, "events">, t: number): ProcessId[] {
  const ready: ProcessId[] = [];
  for (const event of report.events) {
    if (event.t > t) break;
    if (event.from === "READY") {
      const index = ready.indexOf(event.id);
      if (index >= 0) ready.splice(index, 1);
    }
    if (event.to === "READY") ready.push(event.id);
  }
  return ready;
}
