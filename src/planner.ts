/**
 * Batch planner: turns a set of register descriptors into as few read
 * requests as the per-request limit allows, and slices the words of each
 * descriptor back out of the combined result.
 */

import type { RawWords } from "./codec";
import { DecodeError } from "./errors";
import type { RegisterDescriptor, RegisterSpace } from "./registers";

export interface ReadRange {
  readonly space: RegisterSpace;
  readonly address: number;
  readonly count: number;
}

export interface ReadPlan {
  readonly ranges: readonly ReadRange[];
}

export interface PlannerOptions {
  /** Largest register count one request may carry. */
  maxRegistersPerRequest: number;
  /** Unrequested registers tolerated between two merged descriptors. */
  coalesceGapThreshold: number;
}

type PlannedRegisters = Pick<RegisterDescriptor, "space" | "address" | "length">;

const SPACE_ORDER: readonly RegisterSpace[] = ["holding", "input"];

function planSpace(
  space: RegisterSpace,
  descriptors: readonly PlannedRegisters[],
  { maxRegistersPerRequest: max, coalesceGapThreshold: gap }: PlannerOptions
): ReadRange[] {
  const sorted = [...descriptors].sort(
    (a, b) => a.address - b.address || b.length - a.length
  );
  const ranges: ReadRange[] = [];
  let current: { address: number; end: number } | null = null;

  for (const d of sorted) {
    const end = d.address + d.length;
    if (current) {
      if (end <= current.end) continue;
      if (d.address - current.end <= gap && end - current.address <= max) {
        current.end = end;
        continue;
      }
      ranges.push({ space, address: current.address, count: current.end - current.address });
    }
    // Registers already requested by the previous range are not read twice.
    let start: number = current ? Math.max(d.address, current.end) : d.address;
    while (end - start > max) {
      ranges.push({ space, address: start, count: max });
      start += max;
    }
    current = { address: start, end };
  }

  if (current) {
    ranges.push({ space, address: current.address, count: current.end - current.address });
  }
  return ranges;
}

/**
 * Plan the requests needed to read every descriptor. Ranges are grouped by
 * register space, ascending and disjoint within a space.
 */
export function planReads(
  descriptors: readonly PlannedRegisters[],
  options: PlannerOptions
): ReadPlan {
  if (!Number.isInteger(options.maxRegistersPerRequest) || options.maxRegistersPerRequest < 1) {
    throw new RangeError("maxRegistersPerRequest must be a positive integer");
  }
  if (!Number.isInteger(options.coalesceGapThreshold) || options.coalesceGapThreshold < 0) {
    throw new RangeError("coalesceGapThreshold must be a non-negative integer");
  }

  const ranges: ReadRange[] = [];
  for (const space of SPACE_ORDER) {
    const inSpace = descriptors.filter((d) => d.space === space);
    if (inSpace.length > 0) {
      ranges.push(...planSpace(space, inSpace, options));
    }
  }
  return { ranges };
}

/** Total registers a plan requests, gaps included. */
export function plannedRegisterCount(plan: ReadPlan): number {
  return plan.ranges.reduce((sum, range) => sum + range.count, 0);
}

// ---------- Snapshot ----------

/** Raw words returned for every range of a plan, in request order. */
export class RegisterSnapshot {
  private readonly words = new Map<RegisterSpace, Map<number, number>>();

  constructor(ranges: readonly ReadRange[], results: readonly RawWords[]) {
    if (ranges.length !== results.length) {
      throw new RangeError(
        `expected ${ranges.length} range results, got ${results.length}`
      );
    }
    ranges.forEach((range, i) => {
      const result = results[i];
      if (result.length !== range.count) {
        throw new RangeError(
          `range ${range.space}:${range.address} returned ${result.length} of ${range.count} registers`
        );
      }
      let space = this.words.get(range.space);
      if (!space) {
        space = new Map();
        this.words.set(range.space, space);
      }
      for (let offset = 0; offset < range.count; offset++) {
        space.set(range.address + offset, result[offset]);
      }
    });
  }

  /**
   * Words of `count` registers starting at `address`, which may span
   * several ranges.
   */
  slice(space: RegisterSpace, address: number, count: number): RawWords {
    const registers = this.words.get(space);
    const out: number[] = [];
    for (let a = address; a < address + count; a++) {
      const word = registers?.get(a);
      if (word === undefined) {
        throw new RangeError(`${space} register ${a} is not part of the snapshot`);
      }
      out.push(word);
    }
    return out;
  }

  /** @throws DecodeError when the descriptor was not covered by the plan */
  wordsFor(descriptor: RegisterDescriptor): RawWords {
    try {
      return this.slice(descriptor.space, descriptor.address, descriptor.length);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new DecodeError(descriptor.name, err.message);
      }
      throw err;
    }
  }
}
