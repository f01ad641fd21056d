import type { ExponentMatrix } from '../types/instance.js';
import type { RefineOptions } from '../types/options.js';

export interface RefineResult {
  matrix: number[][];
  /** Number of single-unit moves applied */
  moves: number;
}

interface Move {
  row: number;
  from: number;
  to: number;
}

const rowKey = (row: readonly number[]): string => row.join(',');

/**
 * Working copy with the bookkeeping both passes need: column sums and a
 * multiset of row patterns.
 */
class RefineState {
  readonly rows: number[][];
  readonly columnSums: number[];
  private readonly patterns = new Map<string, number>();
  moves = 0;

  constructor(matrix: ExponentMatrix) {
    this.rows = matrix.map((row) => row.slice());
    const width = this.rows[0]?.length ?? 0;
    this.columnSums = new Array<number>(width).fill(0);
    for (const row of this.rows) {
      row.forEach((value, col) => {
        this.columnSums[col] = (this.columnSums[col] ?? 0) + value;
      });
      this.adjustPattern(rowKey(row), 1);
    }
  }

  get width(): number {
    return this.columnSums.length;
  }

  patternCount(key: string): number {
    return this.patterns.get(key) ?? 0;
  }

  /** Row pattern after moving one unit, without applying it. */
  preview(move: Move): string {
    const candidate = (this.rows[move.row] ?? []).slice();
    candidate[move.from] = (candidate[move.from] ?? 0) - 1;
    candidate[move.to] = (candidate[move.to] ?? 0) + 1;
    return rowKey(candidate);
  }

  apply(move: Move): void {
    const row = this.rows[move.row];
    if (!row) return;
    this.adjustPattern(rowKey(row), -1);
    row[move.from] = (row[move.from] ?? 0) - 1;
    row[move.to] = (row[move.to] ?? 0) + 1;
    this.adjustPattern(rowKey(row), 1);
    this.columnSums[move.from] = (this.columnSums[move.from] ?? 0) - 1;
    this.columnSums[move.to] = (this.columnSums[move.to] ?? 0) + 1;
    this.moves += 1;
  }

  /** Columns holding at least one positive entry of `row`, largest first. */
  donors(row: number, exclude: number): number[] {
    const values = this.rows[row] ?? [];
    return values
      .map((value, col) => ({ value, col }))
      .filter(({ value, col }) => value > 0 && col !== exclude)
      .sort((a, b) => b.value - a.value || a.col - b.col)
      .map(({ col }) => col);
  }

  private adjustPattern(key: string, delta: number): void {
    const next = this.patternCount(key) + delta;
    if (next <= 0) {
      this.patterns.delete(key);
    } else {
      this.patterns.set(key, next);
    }
  }
}

/**
 * Gives every all-zero column one unit, taken from a column that keeps mass
 * elsewhere. Impossible when the matrix's total degree is below its width;
 * those columns stay empty.
 */
function coverEmptyColumns(state: RefineState, keepDistinct: boolean): void {
  for (let col = 0; col < state.width; col++) {
    if ((state.columnSums[col] ?? 0) > 0) continue;

    const candidates: Move[] = [];
    state.rows.forEach((_, row) => {
      for (const from of state.donors(row, col)) {
        if ((state.columnSums[from] ?? 0) >= 2) {
          candidates.push({ row, from, to: col });
        }
      }
    });

    const chosen =
      (keepDistinct
        ? candidates.find(
            (move) => state.patternCount(state.preview(move)) === 0
          )
        : undefined) ?? candidates[0];
    if (chosen) state.apply(chosen);
  }
}

/**
 * Moves one unit inside each repeated row toward the least-covered column
 * until its pattern is unique. Rows with no unique single-unit neighbour are
 * left as they are (e.g. m > n with every row of degree 1).
 */
function breakDuplicateRows(state: RefineState, keepCoverage: boolean): void {
  state.rows.forEach((row, rowIdx) => {
    if (state.patternCount(rowKey(row)) <= 1) return;

    const targets = state.columnSums
      .map((sum, col) => ({ sum, col }))
      .sort((a, b) => a.sum - b.sum || a.col - b.col)
      .map(({ col }) => col);

    for (const to of targets) {
      for (const from of state.donors(rowIdx, to)) {
        if (keepCoverage && (state.columnSums[from] ?? 0) < 2) continue;
        const move = { row: rowIdx, from, to };
        if (state.patternCount(state.preview(move)) === 0) {
          state.apply(move);
          return;
        }
      }
    }
  });
}

/**
 * Post-pass over an exponent matrix. Returns a new matrix; every move shifts
 * one unit of degree within a single row, so row sums (and therefore the
 * baseline cost) are unchanged.
 */
export function refineExponentMatrix(
  matrix: ExponentMatrix,
  options: Required<RefineOptions>
): RefineResult {
  const state = new RefineState(matrix);
  if (options.coverVariables) {
    coverEmptyColumns(state, options.distinctRows);
  }
  if (options.distinctRows) {
    breakDuplicateRows(state, options.coverVariables);
  }
  return { matrix: state.rows, moves: state.moves };
}
