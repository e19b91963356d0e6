import type { ProcessId } from "@/lib/types";

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input caught before the first tick. Fix the input and retry. */
export class SetupError extends SimulationError {}

export class DuplicateIdError extends SetupError {
  readonly id: ProcessId;

  constructor(id: ProcessId) {
    super(`process id ${id} is already registered`);
    this.id = id;
  }
}

export class InvalidBurstError extends SetupError {
  readonly id: ProcessId;

  readonly burstTime: number;

  constructor(id: ProcessId, burstTime: number) {
    super(`process ${id} has invalid burst time ${burstTime}; expected a positive integer`);
    this.id = id;
    this.burstTime = burstTime;
  }
}

export class InvalidQuantumError extends SetupError {
  readonly quantum: number;

  constructor(quantum: number) {
    super(`invalid round-robin quantum ${quantum}; expected a positive integer`);
    this.quantum = quantum;
  }
}

export class InvalidCpuCountError extends SetupError {
  readonly cpus: number;

  constructor(cpus: number) {
    super(`invalid cpu count ${cpus}; expected a positive integer`);
    this.cpus = cpus;
  }
}

export class InvalidDescriptorError extends SetupError {}

export class UnknownPolicyError extends SetupError {
  readonly algorithm: string;

  constructor(algorithm: string) {
    super(`not a valid algorithm: ${algorithm}`);
    this.algorithm = algorithm;
  }
}

export class RegistrationClosedError extends SetupError {
  constructor() {
    super("process registration is closed");
  }
}

export class InvalidWorkloadError extends SetupError {}

export class IncompleteSimulationError extends SimulationError {
  readonly pending: ProcessId[];

  constructor(pending: ProcessId[]) {
    super(`simulation incomplete: ${pending.length} process(es) not terminated (${pending.join(", ")})`);
    this.pending = pending;
  }
}

/** A broken engine or policy invariant. Never recoverable. */
export class InvariantViolationError extends SimulationError {}
