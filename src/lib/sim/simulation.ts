import { DEFAULT_CPUS, derivePolicyConfig, validateCpuCount, validatePolicyConfig } from "@/lib/config";
import { SchedulerEngine, type EngineOptions } from "@/lib/sim/engine";
import { buildReport } from "@/lib/sim/metrics";
import { ProcessStore } from "@/lib/sim/processStore";
import type {
  PolicyConfig,
  ProcessDescriptor,
  ProcessInput,
  SimulationReport,
  SimulationSettings,
} from "@/lib/types";

export type PolicySelection = PolicyConfig | SimulationSettings;

export type SimulationOptions = EngineOptions;

function resolvePolicy(selection: PolicySelection): PolicyConfig {
  if ("kind" in selection) return validatePolicyConfig(selection);
  return derivePolicyConfig(selection);
}

/**
 * A validated, ready-to-run simulation. Every setup error is raised by
 * `createSimulation`; `run()` only fails on a broken invariant.
 */
export class Simulation {
  readonly policy: PolicyConfig;

  readonly cpus: number;

  private readonly store: ProcessStore;

  private readonly options: SimulationOptions;

  constructor(store: ProcessStore, policy: PolicyConfig, options: SimulationOptions = {}) {
    store.close();
    this.store = store;
    this.policy = validatePolicyConfig(policy);
    this.cpus = validateCpuCount(options.cpus ?? DEFAULT_CPUS);
    this.options = { ...options, cpus: this.cpus };
  }

  get processes(): ProcessDescriptor[] {
    return this.store.all();
  }

  /** Each call uses a fresh engine, so repeated runs produce equal reports. */
  run(): SimulationReport {
    const engine = new SchedulerEngine(this.store, this.policy, this.options);
    return buildReport(engine.run());
  }
}

export function createSimulation(
  processes: readonly ProcessInput[],
  selection: PolicySelection,
  options: SimulationOptions = {},
): Simulation {
  const policy = resolvePolicy(selection);
  const cpus = options.cpus ?? ("kind" in selection ? undefined : selection.cpus);
  return new Simulation(ProcessStore.from(processes), policy, { ...options, cpus });
}

export function simulate(
  processes: readonly ProcessInput[],
  selection: PolicySelection,
  options: SimulationOptions = {},
): SimulationReport {
  return createSimulation(processes, selection, options).run();
}
