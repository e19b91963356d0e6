export type ObjectiveDirection = "min" | "max";

export type Objective<T> = {
  key: string;
  direction: ObjectiveDirection;
  value: (row: T) => number;
};

const EPS = 1e-9;

function noWorse(a: number, b: number, direction: ObjectiveDirection): boolean {
  return direction === "min" ? a <= b + EPS : a >= b - EPS;
}

function strictlyBetter(a: number, b: number, direction: ObjectiveDirection): boolean {
  return direction === "min" ? a < b - EPS : a > b + EPS;
}

/** True when `candidate` is no worse on every objective and better on one. */
export function dominates<T>(candidate: T, target: T, objectives: ReadonlyArray<Objective<T>>): boolean {
  let better = false;
  for (const { direction, value } of objectives) {
    const a = value(candidate);
    const b = value(target);
    if (!noWorse(a, b, direction)) return false;
    if (strictlyBetter(a, b, direction)) better = true;
  }
  return better;
}

export function paretoFront<T>(rows: readonly T[], objectives: ReadonlyArray<Objective<T>>): T[] {
  return rows.filter((row, index) =>
    rows.every((other, otherIndex) => otherIndex === index || !dominates(other, row, objectives)),
  );
}
