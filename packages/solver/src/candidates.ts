import { cross } from "./topology";
import { Box, COLS, ROWS, Snapshot } from "./types";

const ALL_BOXES = cross(ROWS, COLS);

function isComplete(
  values: Partial<Record<Box, string>>
): values is Record<Box, string> {
  return ALL_BOXES.every((box) => (values[box] ?? "").length > 0);
}

export interface CandidateMapOptions {
  /** Record a snapshot each time a box is resolved to one digit */
  recordHistory?: boolean;
}

/**
 * Per-puzzle solver state: the digits each box may still hold.
 *
 * Every box always has an entry. Writes go through `set`, which ignores
 * unchanged values and, when history is on, snapshots the whole map each
 * time a box is narrowed to a single digit.
 */
export class CandidateMap {
  private values: Record<Box, string>;
  private readonly assignments: Snapshot[] | null;

  private constructor(values: Record<Box, string>, assignments: Snapshot[] | null) {
    this.values = values;
    this.assignments = assignments;
  }

  /** Throws unless every box has at least one candidate. */
  static from(
    values: Readonly<Partial<Record<Box, string>>>,
    options: CandidateMapOptions = {}
  ): CandidateMap {
    if (!isComplete(values)) {
      const box = ALL_BOXES.find((b) => !values[b]);
      throw new Error(`Box ${box} has no candidates`);
    }
    return new CandidateMap({ ...values }, options.recordHistory ? [] : null);
  }

  get(box: Box): string {
    return this.values[box];
  }

  /**
   * Overwrite a box's candidates. Returns false, and records nothing,
   * when the value is unchanged.
   */
  set(box: Box, value: string): boolean {
    if (value.length === 0) {
      throw new Error(`Refusing to store an empty candidate set for ${box}`);
    }
    if (this.values[box] === value) return false;

    this.values[box] = value;
    if (value.length === 1 && this.assignments) {
      this.assignments.push(this.snapshot());
    }
    return true;
  }

  /** Independent copy; snapshots are frozen so the copy shares them. */
  copy(): CandidateMap {
    return new CandidateMap(
      { ...this.values },
      this.assignments ? [...this.assignments] : null
    );
  }

  get recordsHistory(): boolean {
    return this.assignments !== null;
  }

  get history(): readonly Snapshot[] {
    return this.assignments ?? [];
  }

  solvedCount(): number {
    let count = 0;
    for (const digits of Object.values(this.values)) {
      if (digits.length === 1) count++;
    }
    return count;
  }

  isSolved(): boolean {
    return Object.values(this.values).every((digits) => digits.length === 1);
  }

  snapshot(): Snapshot {
    return Object.freeze({ ...this.values });
  }

  toRecord(): Record<Box, string> {
    return { ...this.values };
  }
}
