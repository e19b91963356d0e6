import seedrandom from "seedrandom";

import { InvalidWorkloadError } from "@/lib/errors";
import type { ProcessInput } from "@/lib/types";

export type WorkloadOptions = {
  count: number;
  burstMin: number;
  burstMax: number;
  arrivalGapMin?: number;
  arrivalGapMax?: number;
  priorityMin?: number;
  priorityMax?: number;
  seed?: number | string;
};

const DEFAULT_SEED = "cpu-sched-sim";

function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

function requireRange(name: string, min: number, max: number, floor: number): void {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new InvalidWorkloadError(`${name} bounds must be integers (got ${min}..${max})`);
  }
  if (min < floor) {
    throw new InvalidWorkloadError(`${name} minimum must be at least ${floor} (got ${min})`);
  }
  if (min > max) {
    throw new InvalidWorkloadError(`${name} minimum ${min} exceeds maximum ${max}`);
  }
}

/** Deterministic synthetic process list: ids 1..count, first arrival at tick 0. */
export function generateWorkload(options: WorkloadOptions): ProcessInput[] {
  const {
    count,
    burstMin,
    burstMax,
    arrivalGapMin = 0,
    arrivalGapMax = 0,
    priorityMin = 1,
    priorityMax = 10,
    seed = DEFAULT_SEED,
  } = options;

  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidWorkloadError(`process count must be a non-negative integer (got ${count})`);
  }
  requireRange("burst", burstMin, burstMax, 1);
  requireRange("arrival gap", arrivalGapMin, arrivalGapMax, 0);
  requireRange("priority", priorityMin, priorityMax, Number.MIN_SAFE_INTEGER);

  const rng = seedrandom(String(seed));
  const processes: ProcessInput[] = [];
  let arrivalTime = 0;

  for (let index = 0; index < count; index += 1) {
    if (index > 0) arrivalTime += randomInt(rng, arrivalGapMin, arrivalGapMax);
    processes.push({
      id: index + 1,
      arrivalTime,
      burstTime: randomInt(rng, burstMin, burstMax),
      priority: randomInt(rng, priorityMin, priorityMax),
    });
  }

  return processes;
}
