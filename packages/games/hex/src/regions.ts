import { InvalidBoardError } from "@hexlab/core";
import { HEX_NEIGHBORS, Stone } from "./state";

/** Label of a padded-grid cell that belongs to no region */
export const NO_REGION = 0;
/** Sentinel label of a color's near edge (top for Black, left for White) */
export const NEAR_EDGE = 1;
/** Sentinel label of a color's far edge (bottom for Black, right for White) */
export const FAR_EDGE = 2;

/** (size + 2) x (size + 2) grid of region labels, the board padded by one ring */
export type RegionGrid = number[][];

/** Region grids of both colors, as cached between games on the same start position */
export type RegionGrids = Record<Stone, RegionGrid>;

/**
 * Padded grid with a color's two home edges pre-seeded.
 *
 * Black owns the top and bottom rows, White the left and right columns. The
 * bottom-right corner ends up as FAR_EDGE for both colors; it becomes
 * NEAR_EDGE only when the two edge groups merge.
 */
export function borderGrid(color: Stone, size: number): RegionGrid {
  const span = size + 2;
  const grid: RegionGrid = Array.from({ length: span }, () => Array<number>(span).fill(NO_REGION));

  for (let i = 0; i < span; i++) {
    if (color === "B") {
      grid[0][i] = NEAR_EDGE;
      grid[span - 1][i] = FAR_EDGE;
    } else {
      grid[i][0] = NEAR_EDGE;
      grid[i][span - 1] = FAR_EDGE;
    }
  }

  return grid;
}

export function cloneRegionGrid(grid: RegionGrid): RegionGrid {
  return grid.map((r) => [...r]);
}

function maxLabel(grid: RegionGrid): number {
  let max = NO_REGION;
  for (const row of grid) {
    for (const label of row) {
      if (label > max) max = label;
    }
  }
  return max;
}

function assertRegionGrid(grid: RegionGrid, size: number): void {
  const span = size + 2;
  if (grid.length !== span || grid.some((row) => row.length !== span)) {
    throw new InvalidBoardError(`Region grid must be ${span}x${span} for a ${size}x${size} board`);
  }
  if (grid.some((row) => row.some((label) => !Number.isInteger(label) || label < NO_REGION))) {
    throw new InvalidBoardError("Region labels must be non-negative integers");
  }
}

/**
 * Incremental connectivity of one color's stones.
 *
 * Every group of hex-adjacent stones shares one label. Placing a stone merges
 * all neighbouring groups into the smallest neighbouring label, rewriting the
 * others across the whole grid. The edge sentinels are the two smallest
 * labels, so a group touching both edges always ends up as NEAR_EDGE, and
 * the corner that started as FAR_EDGE flips with it.
 */
export class RegionTracker {
  readonly color: Stone;
  readonly size: number;
  private readonly grid: RegionGrid;
  private counter: number;

  constructor(color: Stone, size: number, grid?: RegionGrid) {
    this.color = color;
    this.size = size;
    if (grid) {
      assertRegionGrid(grid, size);
      this.grid = cloneRegionGrid(grid);
    } else {
      this.grid = borderGrid(color, size);
    }
    this.counter = maxLabel(this.grid) + 1;
  }

  /** Label that the next isolated stone will receive */
  get nextLabel(): number {
    return this.counter;
  }

  /** Region label of a real board cell */
  labelAt(row: number, col: number): number {
    return this.grid[row + 1][col + 1];
  }

  /**
   * Record a stone of this color at (row, col) and merge it with its
   * neighbours. Returns the label the stone now carries.
   */
  insert(row: number, col: number): number {
    const y = row + 1;
    const x = col + 1;

    const adjacent = new Set<number>();
    for (const [dy, dx] of HEX_NEIGHBORS) {
      const label = this.grid[y + dy][x + dx];
      if (label !== NO_REGION) adjacent.add(label);
    }

    if (adjacent.size === 0) {
      const fresh = this.counter++;
      this.grid[y][x] = fresh;
      return fresh;
    }

    const target = Math.min(...adjacent);
    this.grid[y][x] = target;
    adjacent.delete(target);
    if (adjacent.size > 0) {
      this.relabel(adjacent, target);
    }
    return target;
  }

  /** Whether the near and far edges are joined by one group */
  isConnected(): boolean {
    const corner = this.size + 1;
    return this.grid[corner][corner] === NEAR_EDGE;
  }

  /** Deep copy of the padded grid */
  toGrid(): RegionGrid {
    return cloneRegionGrid(this.grid);
  }

  clone(): RegionTracker {
    const copy = new RegionTracker(this.color, this.size, this.grid);
    copy.counter = this.counter;
    return copy;
  }

  private relabel(from: Set<number>, to: number): void {
    for (const row of this.grid) {
      for (let i = 0; i < row.length; i++) {
        if (from.has(row[i])) row[i] = to;
      }
    }
  }
}
