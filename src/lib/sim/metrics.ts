import { IncompleteSimulationError, InvariantViolationError } from "@/lib/errors";
import { formatEventLog } from "@/lib/sim/events";
import type { AverageMetrics, ProcessMetrics, SimulationReport, SimulationRun } from "@/lib/types";

function mean(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function computeProcessMetrics(run: SimulationRun): ProcessMetrics[] {
  const pending = run.runtimes.filter((runtime) => runtime.state !== "TERMINATED").map((runtime) => runtime.id);
  if (pending.length > 0) throw new IncompleteSimulationError(pending);

  const runtimes = new Map(run.runtimes.map((runtime) => [runtime.id, runtime]));

  return run.descriptors.map((descriptor) => {
    const runtime = runtimes.get(descriptor.id);
    if (!runtime) throw new IncompleteSimulationError([descriptor.id]);

    const { firstRunTime, completionTime } = runtime;
    if (firstRunTime === null || completionTime === null) {
      throw new InvariantViolationError(`process ${descriptor.id} terminated without timestamps`);
    }

    const turnaroundTime = completionTime - descriptor.arrivalTime;
    const waitingTime = turnaroundTime - descriptor.burstTime;
    const responseTime = firstRunTime - descriptor.arrivalTime;
    if (waitingTime < 0 || responseTime < 0) {
      throw new InvariantViolationError(
        `process ${descriptor.id} has negative waiting (${waitingTime}) or response (${responseTime}) time`,
      );
    }

    return {
      id: descriptor.id,
      arrivalTime: descriptor.arrivalTime,
      burstTime: descriptor.burstTime,
      priority: descriptor.priority,
      firstRunTime,
      completionTime,
      waitingTime,
      turnaroundTime,
      responseTime,
    };
  });
}

export function computeAverages(rows: readonly ProcessMetrics[]): AverageMetrics {
  return {
    waitingTime: mean(rows.map((row) => row.waitingTime)),
    turnaroundTime: mean(rows.map((row) => row.turnaroundTime)),
    responseTime: mean(rows.map((row) => row.responseTime)),
  };
}

function computeMakespan(rows: readonly ProcessMetrics[]): number {
  if (!rows.length) return 0;
  const firstArrival = Math.min(...rows.map((row) => row.arrivalTime));
  const lastCompletion = Math.max(...rows.map((row) => row.completionTime));
  return lastCompletion - firstArrival;
}

/**
 * Derives the report from a finished run. Pure: the same run always yields
 * an equal report. The tapes are shared with the run, not copied.
 */
export function buildReport(run: SimulationRun): SimulationReport {
  const processes = computeProcessMetrics(run);

  return {
    policy: run.policy,
    processes,
    averages: computeAverages(processes),
    cpuUtilization: ratio(run.busyTicks, run.totalTicks * run.cpus),
    throughput: ratio(processes.length, run.totalTicks),
    makespan: computeMakespan(processes),
    cpus: run.cpus,
    totalTicks: run.totalTicks,
    busyTicks: run.busyTicks,
    idleTicks: run.idleTicks,
    contextSwitches: run.contextSwitches,
    preemptions: run.preemptions,
    gantt: run.gantt,
    events: run.events,
    eventLog: formatEventLog(run.events, run.policy),
  };
}
