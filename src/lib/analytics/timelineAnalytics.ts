import { IDLE_LABEL } from "@/lib/types";

export interface TickRange {
  l: number;
  r: number;
}

export interface RangeStats {
  busyTicks: number;
  idleTicks: number;
  utilPct: number;
  longestBusyStreak: number;
  longestIdleStreak: number;
  totalTicks: number;
}

export type Segment = {
  label: string;
  start: number;
  end: number;
  len: number;
};

const EMPTY_STATS: RangeStats = {
  busyTicks: 0,
  idleTicks: 0,
  utilPct: 0,
  longestBusyStreak: 0,
  longestIdleStreak: 0,
  totalTicks: 0,
};

function isBusy(label: string | undefined): boolean {
  return Boolean(label) && label !== IDLE_LABEL;
}

function clampTick(value: number, maxTick: number): number {
  return Math.max(0, Math.min(Math.floor(value), Math.max(0, maxTick)));
}

export function clampTickRange(range: TickRange, maxTick: number): TickRange {
  const left = clampTick(Math.min(range.l, range.r), maxTick);
  const right = clampTick(Math.max(range.l, range.r), maxTick);
  return { l: left, r: right };
}

/** Run-length encodes a Gantt tape; `end` is inclusive. */
export function buildSegments(gantt: readonly string[]): Segment[] {
  if (gantt.length === 0) return [];

  const segments: Segment[] = [];
  let label = gantt[0] || IDLE_LABEL;
  let start = 0;

  for (let i = 1; i < gantt.length; i += 1) {
    const next = gantt[i] || IDLE_LABEL;
    if (next === label) continue;

    segments.push({ label, start, end: i - 1, len: i - start });
    label = next;
    start = i;
  }

  const tail = gantt.length - 1;
  segments.push({ label, start, end: tail, len: tail - start + 1 });
  return segments;
}

/** Range queries over one CPU lane of a finished run. */
export class TimelineAnalytics {
  private readonly gantt: readonly string[];

  // busyPrefix[i] = busy ticks in [0, i)
  private readonly busyPrefix: number[];

  constructor(gantt: readonly string[]) {
    this.gantt = [...gantt];
    this.busyPrefix = [0];
    for (const label of this.gantt) {
      this.busyPrefix.push(this.busyPrefix[this.busyPrefix.length - 1] + (isBusy(label) ? 1 : 0));
    }
  }

  get length(): number {
    return this.gantt.length;
  }

  getRangeStats(l: number, r: number): RangeStats {
    if (this.gantt.length === 0) return { ...EMPTY_STATS };

    const { l: left, r: right } = clampTickRange({ l, r }, this.gantt.length - 1);
    const totalTicks = right - left + 1;
    const busyTicks = this.busyPrefix[right + 1] - this.busyPrefix[left];

    let longestBusyStreak = 0;
    let longestIdleStreak = 0;
    let streak = 0;
    let streakBusy = false;
    for (let i = left; i <= right; i += 1) {
      const busy = isBusy(this.gantt[i]);
      streak = i > left && busy === streakBusy ? streak + 1 : 1;
      streakBusy = busy;
      if (busy) longestBusyStreak = Math.max(longestBusyStreak, streak);
      else longestIdleStreak = Math.max(longestIdleStreak, streak);
    }

    return {
      busyTicks,
      idleTicks: totalTicks - busyTicks,
      utilPct: (busyTicks / totalTicks) * 100,
      longestBusyStreak,
      longestIdleStreak,
      totalTicks,
    };
  }
}

export function buildTimelineAnalytics(gantt: readonly string[]): TimelineAnalytics {
  return new TimelineAnalytics(gantt);
}
