import { IDLE_LABEL, pidLabel, type SimEvent, type SimulationReport } from "@/lib/types";

export type HeadlineEvent = {
  title: string;
  detail: string;
  severity: "info" | "warn" | "success";
};

function classify(event: SimEvent): { rank: number; title: string; severity: HeadlineEvent["severity"] } {
  if (event.to === "TERMINATED") return { rank: 1, title: "PROCESS COMPLETED", severity: "success" };
  if (event.reason === "preempted") return { rank: 2, title: "PREEMPTION", severity: "warn" };
  if (event.reason === "time_slice") return { rank: 3, title: "TIME SLICE EXPIRED", severity: "info" };
  if (event.to === "RUNNING") return { rank: 4, title: "DISPATCH", severity: "info" };
  return { rank: 5, title: "ARRIVAL", severity: "info" };
}

/** The most significant transition at boundary `t`, or a CPU status line when nothing happened. */
export function headlineEvent(report: SimulationReport, t: number): HeadlineEvent {
  let best: { rank: number; headline: HeadlineEvent } | null = null;

  for (let index = 0; index < report.events.length; index += 1) {
    const event = report.events[index];
    if (event.t !== t) continue;
    const { rank, title, severity } = classify(event);
    if (best && best.rank <= rank) continue;
    best = {
      rank,
      headline: { title, severity, detail: report.eventLog[index] ?? `t=${t}: ${pidLabel(event.id)}` },
    };
  }

  if (best) return best.headline;

  const labels = report.gantt.map((lane) => lane[t] ?? IDLE_LABEL);
  const status =
    labels.length === 1 ? `CPU ${labels[0]}` : labels.map((label, cpu) => `CPU${cpu} ${label}`).join(", ");
  return {
    title: labels.every((label) => label === IDLE_LABEL) ? "CPU IDLE" : "RUNNING",
    detail: `t=${t}: ${status}`,
    severity: "info",
  };
}
