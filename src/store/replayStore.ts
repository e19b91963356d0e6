import { createStore } from "zustand/vanilla";

import { clampReplayTick, getReplayMax, getReplayView, type ReplayView } from "@/lib/replay";
import type { SimulationReport } from "@/lib/types";

export type ReplayStore = {
  report: SimulationReport;
  t: number;
  max: number;
  load: (report: SimulationReport) => void;
  setT: (time: number) => void;
  stepReplay: (delta: number) => void;
  jumpTo: (target: number | "start" | "end") => void;
  reset: () => void;
  view: () => ReplayView;
};

export function createReplayStore(initial: SimulationReport) {
  return createStore<ReplayStore>((set, get) => ({
    report: initial,
    t: 0,
    max: getReplayMax(initial),
    load: (report) =>
      set((state) => ({
        report,
        max: getReplayMax(report),
        t: clampReplayTick(report, state.t),
      })),
    setT: (time) =>
      set((state) => ({
        t: clampReplayTick(state.report, time),
      })),
    stepReplay: (delta) =>
      set((state) => ({
        t: clampReplayTick(state.report, state.t + Math.trunc(delta)),
      })),
    jumpTo: (target) =>
      set((state) => {
        if (target === "start") return { t: 0 };
        if (target === "end") return { t: state.max };
        return { t: clampReplayTick(state.report, target) };
      }),
    reset: () => set({ t: 0 }),
    view: () => {
      const { report, t } = get();
      return getReplayView(report, t);
    },
  }));
}

export type ReplayStoreApi = ReturnType<typeof createReplayStore>;
