import { describe, expect, it } from "vitest";

import {
  DuplicateIdError,
  InvalidBurstError,
  InvalidDescriptorError,
  RegistrationClosedError,
} from "@/lib/errors";
import { ProcessStore } from "@/lib/sim/processStore";

describe("ProcessStore.register", () => {
  it("rejects a duplicate id", () => {
    const store = new ProcessStore();
    store.register({ id: 1, arrivalTime: 0, burstTime: 3 });
    expect(() => store.register({ id: 1, arrivalTime: 4, burstTime: 2 })).toThrow(DuplicateIdError);
  });

  it.each([0, -2, 2.5, Number.NaN])("rejects burst time %s", (burstTime) => {
    const store = new ProcessStore();
    expect(() => store.register({ id: 7, arrivalTime: 0, burstTime })).toThrow(InvalidBurstError);
    expect(store.size).toBe(0);
  });

  it("rejects a negative arrival time and a fractional id", () => {
    const store = new ProcessStore();
    expect(() => store.register({ id: 1, arrivalTime: -1, burstTime: 2 })).toThrow(InvalidDescriptorError);
    expect(() => store.register({ id: 1.5, arrivalTime: 0, burstTime: 2 })).toThrow(InvalidDescriptorError);
  });

  it("defaults priority to 0 and freezes the descriptor", () => {
    const store = new ProcessStore();
    const descriptor = store.register({ id: 4, arrivalTime: 2, burstTime: 6 });
    expect(descriptor).toEqual({ id: 4, arrivalTime: 2, burstTime: 6, priority: 0 });
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it("refuses registration once closed", () => {
    const store = ProcessStore.from([{ id: 1, arrivalTime: 0, burstTime: 1 }]);
    expect(store.isClosed).toBe(true);
    expect(() => store.register({ id: 2, arrivalTime: 0, burstTime: 1 })).toThrow(RegistrationClosedError);
  });
});

describe("ProcessStore.all", () => {
  it("orders by arrival time, then id", () => {
    const store = ProcessStore.from([
      { id: 3, arrivalTime: 0, burstTime: 1 },
      { id: 1, arrivalTime: 2, burstTime: 1 },
      { id: 2, arrivalTime: 0, burstTime: 1 },
    ]);
    expect(store.all().map((descriptor) => descriptor.id)).toEqual([2, 3, 1]);
  });

  it("reports the loop bound inputs", () => {
    const store = ProcessStore.from([
      { id: 1, arrivalTime: 0, burstTime: 4 },
      { id: 2, arrivalTime: 9, burstTime: 2 },
    ]);
    expect(store.totalBurstTime()).toBe(6);
    expect(store.maxArrivalTime()).toBe(9);
  });

  it("creates fresh runtimes in arrival order", () => {
    const store = ProcessStore.from([
      { id: 2, arrivalTime: 1, burstTime: 3 },
      { id: 1, arrivalTime: 0, burstTime: 5 },
    ]);
    const runtimes = [...store.createRuntimes().values()];
    expect(runtimes).toEqual([
      { id: 1, remainingTime: 5, state: "NEW", firstRunTime: null, completionTime: null, readySince: null },
      { id: 2, remainingTime: 3, state: "NEW", firstRunTime: null, completionTime: null, readySince: null },
    ]);
    runtimes[0].remainingTime = 0;
    expect(store.createRuntimes().get(1)?.remainingTime).toBe(5);
  });
});
