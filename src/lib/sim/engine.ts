import { DEFAULT_CPUS, validateCpuCount, validatePolicyConfig } from "@/lib/config";
import { InvariantViolationError } from "@/lib/errors";
import { formatEvent } from "@/lib/sim/events";
import {
  isPreemptive,
  selectNext,
  shouldPreempt,
  type PolicyInput,
  type ReadyEntry,
  type RunningEntry,
} from "@/lib/sim/policies";
import type { ProcessStore } from "@/lib/sim/processStore";
import {
  IDLE_LABEL,
  pidLabel,
  type PolicyConfig,
  type ProcessDescriptor,
  type ProcessId,
  type ProcessRuntime,
  type ProcessRuntimeState,
  type SimEvent,
  type SimulationRun,
  type TransitionReason,
} from "@/lib/types";

export type EngineOptions = {
  /** Number of processors; defaults to 1. */
  cpus?: number;
  /** Called for every state transition, in order, with its log line. */
  onEvent?: (event: SimEvent, line: string) => void;
};

type RunningSlot = {
  runtime: ProcessRuntime;
  sliceLeft: number;
};

/**
 * Discrete-event loop for one simulation. The clock and every piece of
 * run-time state are created when `run()` starts and belong to this instance.
 */
export class SchedulerEngine {
  private readonly store: ProcessStore;

  private readonly policy: PolicyConfig;

  private readonly cpus: number;

  private readonly onEvent: EngineOptions["onEvent"];

  private clock = 0;

  private arrivals: ProcessDescriptor[] = [];

  private nextArrival = 0;

  private runtimes = new Map<ProcessId, ProcessRuntime>();

  private ready: ProcessId[] = [];

  // indexed by CPU
  private slots: Array<RunningSlot | null> = [];

  private lastRan: Array<ProcessId | null> = [];

  private gantt: string[][] = [];

  private terminated = 0;

  private busyTicks = 0;

  private idleTicks = 0;

  private dispatches = 0;

  private contextSwitches = 0;

  private preemptions = 0;

  private events: SimEvent[] = [];

  constructor(store: ProcessStore, policy: PolicyConfig, options: EngineOptions = {}) {
    validatePolicyConfig(policy);
    this.cpus = validateCpuCount(options.cpus ?? DEFAULT_CPUS);
    store.close();
    this.store = store;
    this.policy = policy;
    this.onEvent = options.onEvent;
  }

  run(): SimulationRun {
    this.reset();

    const bound = this.store.totalBurstTime() + this.store.maxArrivalTime();
    while (this.terminated < this.runtimes.size) {
      if (this.clock >= bound) {
        throw new InvariantViolationError(
          `scheduler did not terminate within ${bound} ticks (${this.runtimes.size - this.terminated} process(es) pending)`,
        );
      }
      this.tickStep();
    }

    return {
      policy: this.policy,
      descriptors: this.arrivals,
      runtimes: this.arrivals.map((descriptor) => ({ ...this.runtimeOf(descriptor.id) })),
      cpus: this.cpus,
      totalTicks: this.clock,
      busyTicks: this.busyTicks,
      idleTicks: this.idleTicks,
      gantt: this.gantt,
      events: this.events,
      dispatches: this.dispatches,
      contextSwitches: this.contextSwitches,
      preemptions: this.preemptions,
    };
  }

  private reset(): void {
    this.clock = 0;
    this.arrivals = this.store.all();
    this.nextArrival = 0;
    this.runtimes = this.store.createRuntimes();
    this.ready = [];
    this.slots = new Array<RunningSlot | null>(this.cpus).fill(null);
    this.lastRan = new Array<ProcessId | null>(this.cpus).fill(null);
    this.gantt = Array.from({ length: this.cpus }, (): string[] => []);
    this.terminated = 0;
    this.busyTicks = 0;
    this.idleTicks = 0;
    this.dispatches = 0;
    this.contextSwitches = 0;
    this.preemptions = 0;
    this.events = [];
  }

  private tickStep(): void {
    // A) admit arrivals for this tick
    this.admitArrivals();

    // B) give back exhausted allotments
    for (let cpu = 0; cpu < this.cpus; cpu += 1) {
      if (this.slots[cpu]?.sliceLeft === 0) this.returnToReady(cpu, "time_slice");
    }

    // C) dispatch onto idle CPUs, then let a preemptive policy intervene
    for (let cpu = 0; cpu < this.cpus; cpu += 1) {
      if (!this.slots[cpu]) this.dispatch(cpu);
    }
    if (isPreemptive(this.policy.kind)) this.preemptWhileBetter();

    // D) execute one tick on every CPU
    this.executeTick();
  }

  private admitArrivals(): void {
    while (this.nextArrival < this.arrivals.length) {
      const descriptor = this.arrivals[this.nextArrival];
      if (descriptor.arrivalTime > this.clock) break;

      const runtime = this.runtimeOf(descriptor.id);
      runtime.readySince = this.clock;
      this.transition(runtime, "READY");
      this.ready.push(runtime.id);
      this.nextArrival += 1;
    }
  }

  /** Evicts the least urgent running process while a strictly more urgent one waits and no CPU is free. */
  private preemptWhileBetter(): void {
    // every eviction seats a strictly more urgent process, so at most one per process
    for (let round = 0; round <= this.runtimes.size; round += 1) {
      if (this.slots.includes(null)) return;

      const verdict = shouldPreempt(this.policyInput());
      if (!verdict.preempt) return;

      const cpu = this.slots.findIndex((slot) => slot?.runtime.id === verdict.victim);
      if (cpu < 0) {
        throw new InvariantViolationError(
          `policy ${this.policy.kind} preempted ${pidLabel(verdict.victim)} at t=${this.clock}, which is not running`,
        );
      }
      this.preemptions += 1;
      this.returnToReady(cpu, "preempted", verdict.by);
      this.dispatch(cpu);
    }
    throw new InvariantViolationError(`policy ${this.policy.kind} did not settle its preemptions at t=${this.clock}`);
  }

  private returnToReady(cpu: number, reason: TransitionReason, by?: ProcessId): void {
    const slot = this.slots[cpu];
    if (!slot) return;

    slot.runtime.readySince = this.clock;
    this.transition(slot.runtime, "READY", reason, by);
    this.ready.push(slot.runtime.id);
    this.slots[cpu] = null;
  }

  private dispatch(cpu: number): void {
    const decision = selectNext(this.policyInput());
    if (decision.kind === "idle") {
      if (this.ready.length > 0) {
        throw new InvariantViolationError(
          `policy ${this.policy.kind} idled at t=${this.clock} with ${this.ready.length} ready process(es)`,
        );
      }
      return;
    }

    const index = this.ready.indexOf(decision.id);
    if (index < 0) {
      throw new InvariantViolationError(
        `policy ${this.policy.kind} selected ${pidLabel(decision.id)} at t=${this.clock}, which is not ready`,
      );
    }

    const runtime = this.runtimeOf(decision.id);
    const allotted = decision.allottedTicks;
    if (!Number.isSafeInteger(allotted) || allotted < 1 || allotted > runtime.remainingTime) {
      throw new InvariantViolationError(
        `policy ${this.policy.kind} allotted ${allotted} tick(s) to ${pidLabel(runtime.id)} with ${runtime.remainingTime} remaining`,
      );
    }

    this.ready.splice(index, 1);
    if (runtime.firstRunTime === null) runtime.firstRunTime = this.clock;
    this.transition(runtime, "RUNNING");

    this.dispatches += 1;
    const previous = this.lastRan[cpu];
    if (previous !== null && previous !== runtime.id) this.contextSwitches += 1;

    this.slots[cpu] = { runtime, sliceLeft: allotted };
  }

  private executeTick(): void {
    for (let cpu = 0; cpu < this.cpus; cpu += 1) {
      const slot = this.slots[cpu];
      if (!slot) {
        this.gantt[cpu].push(IDLE_LABEL);
        this.idleTicks += 1;
        continue;
      }

      const { runtime } = slot;
      this.gantt[cpu].push(pidLabel(runtime.id));
      runtime.remainingTime -= 1;
      slot.sliceLeft -= 1;
      this.busyTicks += 1;
      this.lastRan[cpu] = runtime.id;

      if (runtime.remainingTime < 0) {
        throw new InvariantViolationError(`${pidLabel(runtime.id)} has negative remaining time at t=${this.clock}`);
      }
    }

    this.clock += 1;

    for (let cpu = 0; cpu < this.cpus; cpu += 1) {
      const slot = this.slots[cpu];
      if (!slot || slot.runtime.remainingTime > 0) continue;

      slot.runtime.completionTime = this.clock;
      this.transition(slot.runtime, "TERMINATED");
      this.terminated += 1;
      this.slots[cpu] = null;
    }
  }

  private policyInput(): PolicyInput {
    const running: RunningEntry[] = [];
    this.slots.forEach((slot, cpu) => {
      if (slot) running.push({ ...this.readyEntry(slot.runtime.id), cpu, sliceLeft: slot.sliceLeft });
    });
    return {
      tick: this.clock,
      ready: this.ready.map((id) => this.readyEntry(id)),
      running,
      config: this.policy,
    };
  }

  private readyEntry(id: ProcessId): ReadyEntry {
    const descriptor = this.descriptorOf(id);
    const runtime = this.runtimeOf(id);
    return {
      id,
      arrivalTime: descriptor.arrivalTime,
      priority: descriptor.priority,
      remainingTime: runtime.remainingTime,
      readySince: runtime.readySince ?? descriptor.arrivalTime,
    };
  }

  private transition(
    runtime: ProcessRuntime,
    to: ProcessRuntimeState,
    reason?: TransitionReason,
    by?: ProcessId,
  ): void {
    const event: SimEvent = { t: this.clock, id: runtime.id, from: runtime.state, to };
    if (reason) event.reason = reason;
    if (by !== undefined) event.by = by;

    runtime.state = to;
    this.events.push(event);
    this.onEvent?.(event, formatEvent(event, this.policy));
  }

  private runtimeOf(id: ProcessId): ProcessRuntime {
    const runtime = this.runtimes.get(id);
    if (!runtime) throw new InvariantViolationError(`unknown process ${pidLabel(id)}`);
    return runtime;
  }

  private descriptorOf(id: ProcessId): ProcessDescriptor {
    const descriptor = this.store.get(id);
    if (!descriptor) throw new InvariantViolationError(`unknown process ${pidLabel(id)}`);
    return descriptor;
  }
}
