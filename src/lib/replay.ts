import { deriveProcessStates, deriveReadyQueue } from "@/lib/sim/deriveProcessStates";
import { headlineEvent, type HeadlineEvent } from "@/lib/sim/headlineEvent";
import { IDLE_LABEL, pidLabel, type ProcessRuntimeState, type SimulationReport } from "@/lib/types";

const EVENT_WINDOW = 20;

export type ReplayView = {
  t: number;
  /** One label per CPU. */
  running: string[];
  ready: string[];
  states: Record<string, ProcessRuntimeState>;
  eventLog: string[];
  headline: HeadlineEvent;
};

export function getReplayMax(report: SimulationReport): number {
  return Math.max(report.totalTicks - 1, 0);
}

export function clampReplayTick(report: SimulationReport, requestedT: number): number {
  const t = Number.isFinite(requestedT) ? Math.floor(requestedT) : 0;
  return Math.max(0, Math.min(t, getReplayMax(report)));
}

function eventLogUntil(report: SimulationReport, t: number): string[] {
  const lines: string[] = [];
  report.events.forEach((event, index) => {
    if (event.t <= t) lines.push(report.eventLog[index]);
  });
  return lines.slice(-EVENT_WINDOW);
}

export function getReplayView(report: SimulationReport, requestedT: number): ReplayView {
  const t = clampReplayTick(report, requestedT);
  return {
    t,
    running: report.gantt.map((lane) => lane[t] ?? IDLE_LABEL),
    ready: deriveReadyQueue(report, t).map(pidLabel),
    states: deriveProcessStates(report, t),
    eventLog: eventLogUntil(report, t),
    headline: headlineEvent(report, t),
  };
}
