import { describe, expect, it } from "vitest";

import { DEFAULT_CPUS, InvalidCpuCountError, deriveReadyQueue, simulate } from "@/index";

describe("public entry point", () => {
  it("runs a simulation end to end", () => {
    const report = simulate(
      [
        { id: 1, arrivalTime: 0, burstTime: 2 },
        { id: 2, arrivalTime: 0, burstTime: 2 },
      ],
      { algorithm: "RR", quantum: 1 },
    );
    expect(report.cpus).toBe(DEFAULT_CPUS);
    expect(report.gantt).toEqual([["P1", "P2", "P1", "P2"]]);
    expect(deriveReadyQueue(report, 1)).toEqual([1]);
  });

  it("exposes the setup errors", () => {
    expect(() => simulate([], { algorithm: "FCFS", cpus: 0 })).toThrow(InvalidCpuCountError);
  });
});
