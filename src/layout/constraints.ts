/**
 * Sizing constraints and the one-dimensional solver behind grid layouts
 */

export type Constraint =
  /** Share of the available space, 0 to 100. Shrinks when space runs out */
  | { kind: 'percentage'; value: number }
  /** Exact number of columns or rows */
  | { kind: 'fixed'; value: number }
  /** At least min, at most max */
  | { kind: 'range'; min: number; max: number }
  | { kind: 'min'; value: number }
  | { kind: 'max'; value: number }
  /** Whatever is left, split evenly with other flexible constraints */
  | { kind: 'flexible' };

export type LayoutErrorKind = 'InsufficientSpace' | 'InvalidPercentages' | 'ConstraintConflict';

const LAYOUT_ERROR_MESSAGES: Record<LayoutErrorKind, string> = {
  InsufficientSpace: 'Constraints need more space than is available',
  InvalidPercentages: 'Percentages must each be within 0-100 and sum to at most 100',
  ConstraintConflict: 'Constraints cannot be satisfied together',
};

export class LayoutError extends Error {
  constructor(
    public kind: LayoutErrorKind,
    message: string = LAYOUT_ERROR_MESSAGES[kind],
  ) {
    super(message);
    this.name = 'LayoutError';
  }
}

export function percent(value: number): Constraint {
  return { kind: 'percentage', value };
}

export function fixed(value: number): Constraint {
  return { kind: 'fixed', value };
}

export function range(min: number, max: number): Constraint {
  return { kind: 'range', min, max };
}

export function min(value: number): Constraint {
  return { kind: 'min', value };
}

export function max(value: number): Constraint {
  return { kind: 'max', value };
}

export function flexible(): Constraint {
  return { kind: 'flexible' };
}

/**
 * Resolve constraints for a single dimension (a row's columns, or the rows
 * of a grid) into concrete sizes that sum to at most `available`.
 *
 * Order of allocation: fixed, then percentages (shrunk proportionally when
 * they don't fit beside the fixed sizes), then minimums of range/min, then
 * leftover space handed out round-robin to flexible, min, max and range
 * constraints up to their caps. Remainders go to earlier constraints first.
 *
 * @throws LayoutError
 */
export function resolveConstraints(constraints: readonly Constraint[], available: number): number[] {
  if (constraints.length === 0) return [];

  let totalPercentage = 0;
  for (const constraint of constraints) {
    if (constraint.kind === 'percentage') {
      if (!(constraint.value >= 0 && constraint.value <= 100)) {
        throw new LayoutError('InvalidPercentages');
      }
      totalPercentage += constraint.value;
    } else if (constraint.kind === 'range' && constraint.min > constraint.max) {
      throw new LayoutError(
        'ConstraintConflict',
        `Range minimum ${constraint.min} is greater than its maximum ${constraint.max}`,
      );
    }
  }

  if (totalPercentage > 100) {
    throw new LayoutError('InvalidPercentages');
  }

  const sizes = new Array<number>(constraints.length).fill(0);

  // Fixed sizes first
  let fixedTotal = 0;
  constraints.forEach((constraint, i) => {
    if (constraint.kind === 'fixed') {
      sizes[i] = constraint.value;
      fixedTotal += constraint.value;
    }
  });

  if (fixedTotal > available) {
    throw new LayoutError('InsufficientSpace');
  }

  // Percentages of the whole space
  const percentageIndices: number[] = [];
  let percentageTotal = 0;
  constraints.forEach((constraint, i) => {
    if (constraint.kind === 'percentage') {
      sizes[i] = Math.round((available * constraint.value) / 100);
      percentageTotal += sizes[i];
      percentageIndices.push(i);
    }
  });

  if (percentageIndices.length > 0 && percentageTotal > 0 && fixedTotal + percentageTotal > available) {
    shrinkProportionally(sizes, percentageIndices, available - fixedTotal, percentageTotal);
  }

  // Minimums may push the total past the available space
  constraints.forEach((constraint, i) => {
    if (constraint.kind === 'range') {
      sizes[i] = Math.max(sizes[i], constraint.min);
    } else if (constraint.kind === 'min') {
      sizes[i] = Math.max(sizes[i], constraint.value);
    }
  });

  const used = sizes.reduce((sum, size) => sum + size, 0);
  if (used > available) {
    throw new LayoutError('InsufficientSpace');
  }

  distributeRemaining(constraints, sizes, available - used);

  return sizes;
}

/**
 * Scale the percentage allocations into `budget` so they sum to it exactly:
 * floor each scaled share, then give the leftover units to the largest
 * fractional parts (earlier constraints win ties)
 */
function shrinkProportionally(sizes: number[], indices: number[], budget: number, total: number): void {
  const factor = budget / total;
  const exact = indices.map(i => sizes[i] * factor);
  const floors = exact.map(Math.floor);
  let leftover = budget - floors.reduce((sum, n) => sum + n, 0);

  const order = indices
    .map((_, k) => k)
    .sort((a, b) => exact[b] - floors[b] - (exact[a] - floors[a]) || a - b);

  for (const k of order) {
    if (leftover <= 0) break;
    floors[k]++;
    leftover--;
  }

  indices.forEach((i, k) => {
    sizes[i] = floors[k];
  });
}

/**
 * Hand out remaining space in whole-unit rounds among expandable
 * constraints until the space or the headroom runs out
 */
function distributeRemaining(constraints: readonly Constraint[], sizes: number[], remaining: number): void {
  const expandable: Array<{ index: number; cap: number }> = [];

  constraints.forEach((constraint, index) => {
    switch (constraint.kind) {
      case 'range':
        expandable.push({ index, cap: constraint.max });
        break;
      case 'max':
        expandable.push({ index, cap: constraint.value });
        break;
      case 'min':
      case 'flexible':
        expandable.push({ index, cap: Number.POSITIVE_INFINITY });
        break;
      default:
        break;
    }
  });

  while (remaining > 0) {
    const eligible = expandable.filter(({ index, cap }) => sizes[index] < cap);
    if (eligible.length === 0) break;

    const share = Math.max(1, Math.floor(remaining / eligible.length));
    let distributed = 0;

    for (const { index, cap } of eligible) {
      if (remaining === 0) break;
      const add = Math.min(cap - sizes[index], share, remaining);
      sizes[index] += add;
      distributed += add;
      remaining -= add;
    }

    if (distributed === 0) break;
  }
}
