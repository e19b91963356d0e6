import { InvalidCpuCountError, InvalidQuantumError, UnknownPolicyError } from "@/lib/errors";
import { POLICY_KINDS } from "@/lib/sim/policies";
import type { Algorithm, PolicyConfig, PolicyKind, SimulationSettings } from "@/lib/types";

export const DEFAULT_QUANTUM = 2;

export const DEFAULT_CPUS = 1;

const ALGORITHM_ALIASES: Record<string, PolicyKind> = {
  fcfs: "FCFS",
  fifo: "FCFS",
  sjn: "SJN",
  sjf: "SJN",
  srtf: "SRTF",
  srtn: "SRTF",
  rr: "RR",
  round_robin: "RR",
  priority: "PRIORITY_P",
  priority_p: "PRIORITY_P",
  priority_np: "PRIORITY_NP",
};

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function parseAlgorithm(name: string): PolicyKind {
  const kind = ALGORITHM_ALIASES[normalizeName(name)];
  if (!kind) throw new UnknownPolicyError(name);
  return kind;
}

export function validateQuantum(quantum: number): number {
  if (!Number.isSafeInteger(quantum) || quantum <= 0) {
    throw new InvalidQuantumError(quantum);
  }
  return quantum;
}

export function validateCpuCount(cpus: number): number {
  if (!Number.isSafeInteger(cpus) || cpus < 1) {
    throw new InvalidCpuCountError(cpus);
  }
  return cpus;
}

export function validatePolicyConfig(config: PolicyConfig): PolicyConfig {
  if (!POLICY_KINDS.includes(config.kind)) throw new UnknownPolicyError(String(config.kind));
  if (config.kind === "RR") validateQuantum(config.quantum);
  return config;
}

export function policyConfigFor(kind: PolicyKind, quantum: number = DEFAULT_QUANTUM): PolicyConfig {
  if (kind === "RR") return { kind, quantum: validateQuantum(quantum) };
  return { kind };
}

export function derivePolicyConfig(settings: SimulationSettings): PolicyConfig {
  if (settings.algorithm === "PRIORITY") {
    return settings.preemptive === false ? { kind: "PRIORITY_NP" } : { kind: "PRIORITY_P" };
  }
  return policyConfigFor(parseAlgorithm(settings.algorithm), settings.quantum ?? DEFAULT_QUANTUM);
}

export function toSettings(config: PolicyConfig): SimulationSettings {
  if (config.kind === "PRIORITY_NP") return { algorithm: "PRIORITY", preemptive: false };
  if (config.kind === "PRIORITY_P") return { algorithm: "PRIORITY", preemptive: true };
  if (config.kind === "RR") return { algorithm: "RR", preemptive: true, quantum: config.quantum };

  const algorithm: Algorithm = config.kind;
  return { algorithm, preemptive: config.kind === "SRTF" };
}

export function describePolicy(config: PolicyConfig): string {
  if (config.kind === "RR") return `RR (q=${config.quantum})`;
  return config.kind;
}
