import { describe, expect, it, vi } from "vitest";

import { policyConfigFor } from "@/lib/config";
import { DuplicateIdError, InvalidBurstError, InvalidCpuCountError, InvalidQuantumError } from "@/lib/errors";
import { POLICY_KINDS } from "@/lib/sim/policies";
import { createSimulation, simulate } from "@/lib/sim/simulation";
import { generateWorkload } from "@/lib/workload";

describe("createSimulation", () => {
  it("fails on setup errors before any tick", () => {
    const onEvent = vi.fn();
    expect(() =>
      createSimulation(
        [
          { id: 1, arrivalTime: 0, burstTime: 2 },
          { id: 1, arrivalTime: 1, burstTime: 2 },
        ],
        { kind: "FCFS" },
        { onEvent },
      ),
    ).toThrow(DuplicateIdError);
    expect(() => createSimulation([{ id: 1, arrivalTime: 0, burstTime: 0 }], { kind: "FCFS" })).toThrow(
      InvalidBurstError,
    );
    expect(() => createSimulation([], { kind: "RR", quantum: 0 })).toThrow(InvalidQuantumError);
    expect(() => createSimulation([], { algorithm: "RR", quantum: -3 })).toThrow(InvalidQuantumError);
    expect(() => createSimulation([], { kind: "FCFS" }, { cpus: 0 })).toThrow(InvalidCpuCountError);
    expect(() => createSimulation([], { algorithm: "SJN", cpus: -1 })).toThrow(InvalidCpuCountError);
    expect(onEvent).not.toHaveBeenCalled();
  });

  it("accepts dashboard-style settings", () => {
    const simulation = createSimulation([{ id: 1, arrivalTime: 0, burstTime: 1 }], {
      algorithm: "PRIORITY",
      preemptive: false,
    });
    expect(simulation.policy).toEqual({ kind: "PRIORITY_NP" });
    expect(simulation.processes).toEqual([{ id: 1, arrivalTime: 0, burstTime: 1, priority: 0 }]);
    expect(simulation.cpus).toBe(1);
  });

  it("takes the CPU count from settings unless the options give one", () => {
    expect(createSimulation([], { algorithm: "FCFS", cpus: 3 }).cpus).toBe(3);
    expect(createSimulation([], { algorithm: "FCFS", cpus: 3 }, { cpus: 2 }).cpus).toBe(2);
    expect(simulate([], { kind: "FCFS" }, { cpus: 4 }).gantt).toEqual([[], [], [], []]);
  });
});

describe("Simulation.run", () => {
  it("is deterministic across runs and instances", () => {
    const processes = generateWorkload({ count: 8, burstMin: 1, burstMax: 6, arrivalGapMax: 3, seed: 42 });
    const simulation = createSimulation(processes, { kind: "RR", quantum: 3 });
    const first = simulation.run();
    expect(simulation.run()).toEqual(first);
    expect(simulate(processes, { kind: "RR", quantum: 3 })).toEqual(first);
  });

  it("streams the same lines it reports", () => {
    const lines: string[] = [];
    const report = simulate(
      [
        { id: 1, arrivalTime: 0, burstTime: 2 },
        { id: 2, arrivalTime: 0, burstTime: 1 },
      ],
      { kind: "SJN" },
      { onEvent: (_event, line) => lines.push(line) },
    );
    expect(lines).toEqual(report.eventLog);
    expect(lines).toEqual([
      "t=0: P1 NEW -> READY",
      "t=0: P2 NEW -> READY",
      "t=0: P2 READY -> RUNNING",
      "t=1: P2 RUNNING -> TERMINATED",
      "t=1: P1 READY -> RUNNING",
      "t=3: P1 RUNNING -> TERMINATED",
    ]);
  });
});

describe("scheduling properties", () => {
  const workloads = [1, 7, 2024].map((seed) =>
    generateWorkload({ count: 12, burstMin: 1, burstMax: 9, arrivalGapMin: 0, arrivalGapMax: 4, seed }),
  );

  for (const kind of POLICY_KINDS) {
    it(`${kind} conserves work and never finishes early`, () => {
      for (const processes of workloads) {
        const report = simulate(processes, policyConfigFor(kind, 2));
        const totalBurst = processes.reduce((sum, process) => sum + process.burstTime, 0);

        expect(report.busyTicks).toBe(totalBurst);
        expect(report.busyTicks + report.idleTicks).toBe(report.totalTicks);
        for (const row of report.processes) {
          expect(row.completionTime).toBeGreaterThanOrEqual(row.arrivalTime + row.burstTime);
          expect(row.turnaroundTime).toBeGreaterThanOrEqual(row.burstTime);
          expect(row.waitingTime).toBeGreaterThanOrEqual(0);
          expect(row.responseTime).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it(`${kind} never runs one process on two CPUs in the same tick`, () => {
      for (const processes of workloads) {
        const report = simulate(processes, policyConfigFor(kind, 2), { cpus: 3 });
        const totalBurst = processes.reduce((sum, process) => sum + process.burstTime, 0);

        expect(report.busyTicks).toBe(totalBurst);
        expect(report.busyTicks + report.idleTicks).toBe(report.totalTicks * 3);
        for (let t = 0; t < report.totalTicks; t += 1) {
          const busy = report.gantt.map((lane) => lane[t]).filter((label) => label !== "IDLE");
          expect(new Set(busy).size).toBe(busy.length);
        }
      }
    });
  }
});
