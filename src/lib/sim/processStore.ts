import {
  DuplicateIdError,
  InvalidBurstError,
  InvalidDescriptorError,
  RegistrationClosedError,
} from "@/lib/errors";
import type { ProcessDescriptor, ProcessId, ProcessInput, ProcessRuntime } from "@/lib/types";

export function compareIds(a: ProcessId, b: ProcessId): number {
  return a - b;
}

function byArrivalThenId(a: ProcessDescriptor, b: ProcessDescriptor): number {
  if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime - b.arrivalTime;
  return compareIds(a.id, b.id);
}

function isTick(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function toDescriptor(input: ProcessInput): ProcessDescriptor {
  const { id, arrivalTime, burstTime } = input;
  const priority = input.priority ?? 0;

  if (!isTick(id)) {
    throw new InvalidDescriptorError(`invalid process id ${id}; expected a non-negative integer`);
  }
  if (!Number.isSafeInteger(burstTime) || burstTime <= 0) {
    throw new InvalidBurstError(id, burstTime);
  }
  if (!isTick(arrivalTime)) {
    throw new InvalidDescriptorError(
      `process ${id} has invalid arrival time ${arrivalTime}; expected a non-negative integer`,
    );
  }
  if (!Number.isSafeInteger(priority)) {
    throw new InvalidDescriptorError(`process ${id} has invalid priority ${priority}; expected an integer`);
  }

  return Object.freeze({ id, arrivalTime, burstTime, priority });
}

/**
 * Immutable descriptors for one simulation. Registration is open until
 * `close()`; afterwards the set is fixed and `all()` is stable.
 */
export class ProcessStore {
  private descriptors = new Map<ProcessId, ProcessDescriptor>();

  private ordered: ProcessDescriptor[] | null = null;

  private closed = false;

  static from(inputs: readonly ProcessInput[]): ProcessStore {
    const store = new ProcessStore();
    for (const input of inputs) store.register(input);
    store.close();
    return store;
  }

  get size(): number {
    return this.descriptors.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  register(input: ProcessInput): ProcessDescriptor {
    if (this.closed) throw new RegistrationClosedError();
    if (this.descriptors.has(input.id)) throw new DuplicateIdError(input.id);

    const descriptor = toDescriptor(input);
    this.descriptors.set(descriptor.id, descriptor);
    this.ordered = null;
    return descriptor;
  }

  close(): void {
    this.closed = true;
  }

  get(id: ProcessId): ProcessDescriptor | undefined {
    return this.descriptors.get(id);
  }

  /** Ordered by arrival time, then id. */
  all(): ProcessDescriptor[] {
    if (!this.ordered) {
      this.ordered = [...this.descriptors.values()].sort(byArrivalThenId);
    }
    return [...this.ordered];
  }

  totalBurstTime(): number {
    let total = 0;
    for (const descriptor of this.descriptors.values()) total += descriptor.burstTime;
    return total;
  }

  maxArrivalTime(): number {
    let max = 0;
    for (const descriptor of this.descriptors.values()) max = Math.max(max, descriptor.arrivalTime);
    return max;
  }

  /** Fresh run-time bookkeeping, one entry per descriptor, in `all()` order. */
  createRuntimes(): Map<ProcessId, ProcessRuntime> {
    const runtimes = new Map<ProcessId, ProcessRuntime>();
    for (const descriptor of this.all()) {
      runtimes.set(descriptor.id, {
        id: descriptor.id,
        remainingTime: descriptor.burstTime,
        state: "NEW",
        firstRunTime: null,
        completionTime: null,
        readySince: null,
      });
    }
    return runtimes;
  }
}
