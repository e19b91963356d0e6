import { describe, expect, it } from "vitest";

import { comparePolicies, comparisonFront, rankPolicies } from "@/lib/compare";
import { computeFairness, nearestRankPercentile, populationStd } from "@/lib/compare/fairness";
import { simulate } from "@/lib/sim/simulation";

const processes = [
  { id: 1, arrivalTime: 0, burstTime: 5, priority: 2 },
  { id: 2, arrivalTime: 1, burstTime: 3, priority: 1 },
];

describe("comparePolicies", () => {
  it("runs every policy on the same input", () => {
    const rows = comparePolicies(processes);
    expect(rows.map((row) => row.label)).toEqual(["FCFS", "SJN", "SRTF", "RR (q=2)", "PRIORITY_P", "PRIORITY_NP"]);

    const byLabel = Object.fromEntries(rows.map((row) => [row.label, row.report.averages]));
    expect(byLabel.FCFS).toEqual({ waitingTime: 2, turnaroundTime: 6, responseTime: 2 });
    expect(byLabel.SRTF).toEqual({ waitingTime: 1.5, turnaroundTime: 5.5, responseTime: 0 });
    expect(byLabel["RR (q=2)"]).toEqual({ waitingTime: 3, turnaroundTime: 7, responseTime: 0.5 });
    expect(byLabel.PRIORITY_P).toEqual(byLabel.SRTF);
  });

  it("honours a policy subset and quantum", () => {
    const rows = comparePolicies(processes, { policies: ["RR"], quantum: 5 });
    expect(rows).toHaveLength(1);
    expect(rows[0].policy).toEqual({ kind: "RR", quantum: 5 });
    expect(rows[0].report.gantt).toEqual([["P1", "P1", "P1", "P1", "P1", "P2", "P2", "P2"]]);
  });
});

describe("comparePolicies on several CPUs", () => {
  it("passes the CPU count to every run", () => {
    const [row] = comparePolicies(processes, { policies: ["FCFS"], cpus: 2 });
    expect(row.report.cpus).toBe(2);
    expect(row.report.averages).toEqual({ waitingTime: 0, turnaroundTime: 4, responseTime: 0 });
    expect(row.report.makespan).toBe(5);
  });
});

describe("rankPolicies", () => {
  const rows = comparePolicies(processes);

  it("orders by turnaround for fairness", () => {
    expect(rankPolicies(rows, "fairness").map((row) => row.label)).toEqual([
      "SRTF",
      "PRIORITY_P",
      "FCFS",
      "SJN",
      "PRIORITY_NP",
      "RR (q=2)",
    ]);
  });

  it("orders by response time for responsiveness", () => {
    expect(rankPolicies(rows, "responsiveness").map((row) => row.label)).toEqual([
      "SRTF",
      "PRIORITY_P",
      "RR (q=2)",
      "FCFS",
      "SJN",
      "PRIORITY_NP",
    ]);
  });

  it("does not reorder its input", () => {
    rankPolicies(rows, "throughput");
    expect(rows[0].label).toBe("FCFS");
  });
});

describe("comparisonFront", () => {
  it("drops dominated policies", () => {
    const front = comparisonFront(comparePolicies(processes));
    expect(front.map((row) => row.label)).toEqual(["SRTF", "PRIORITY_P"]);
  });
});

describe("fairness", () => {
  it("computes the nearest-rank percentile and population std", () => {
    expect(nearestRankPercentile([5, 1, 3, 2, 4], 95)).toBe(5);
    expect(nearestRankPercentile([], 95)).toBe(0);
    expect(populationStd([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("summarises waiting-time spread", () => {
    const report = simulate(processes, { kind: "FCFS" });
    expect(computeFairness(report)).toEqual({
      maxWaitingTime: 4,
      p95WaitingTime: 4,
      waitingTimeStd: 2,
      starvation: false,
      starvationThreshold: 10,
    });
  });

  it("flags a process stuck behind a long job", () => {
    const report = simulate(
      [
        { id: 1, arrivalTime: 0, burstTime: 30 },
        { id: 2, arrivalTime: 0, burstTime: 1 },
      ],
      { kind: "FCFS" },
    );
    const fairness = computeFairness(report);
    expect(fairness.maxWaitingTime).toBe(30);
    expect(fairness.starvationThreshold).toBe(30);
    expect(fairness.starvation).toBe(true);
  });
});
