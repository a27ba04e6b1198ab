import { strict as assert } from "assert";
import { InvalidBoardError } from "@hexlab/core";
import { RegionTracker, borderGrid, NO_REGION, NEAR_EDGE, FAR_EDGE } from "./regions";

function labelsIn(grid: number[][]): Set<number> {
  return new Set(grid.flat());
}

describe("borderGrid", () => {
  it("should seed Black's top and bottom rows", () => {
    assert.deepEqual(borderGrid("B", 3), [
      [1, 1, 1, 1, 1],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
      [2, 2, 2, 2, 2],
    ]);
  });

  it("should seed White's left and right columns", () => {
    assert.deepEqual(borderGrid("W", 3), [
      [1, 0, 0, 0, 2],
      [1, 0, 0, 0, 2],
      [1, 0, 0, 0, 2],
      [1, 0, 0, 0, 2],
      [1, 0, 0, 0, 2],
    ]);
  });

  it("should start the shared corner at the far-edge label for both colors", () => {
    assert.equal(borderGrid("B", 4)[5][5], FAR_EDGE);
    assert.equal(borderGrid("W", 4)[5][5], FAR_EDGE);
  });
});

describe("RegionTracker", () => {
  describe("construction", () => {
    it("should allocate labels after the sentinels", () => {
      const tracker = new RegionTracker("B", 5);
      assert.equal(tracker.nextLabel, 3);
      assert.equal(tracker.isConnected(), false);
    });

    it("should continue after the highest label of a supplied grid", () => {
      const grid = borderGrid("W", 2);
      grid[1][2] = 7;
      const tracker = new RegionTracker("W", 2, grid);

      assert.equal(tracker.nextLabel, 8);
      assert.equal(tracker.labelAt(0, 1), 7);
    });

    it("should not alias a supplied grid", () => {
      const grid = borderGrid("B", 3);
      const tracker = new RegionTracker("B", 3, grid);
      tracker.insert(0, 0);

      assert.equal(grid[1][1], NO_REGION);
      assert.equal(tracker.labelAt(0, 0), NEAR_EDGE);
    });

    it("should reject a grid of the wrong size", () => {
      assert.throws(() => new RegionTracker("B", 3, borderGrid("B", 4)), InvalidBoardError);
      assert.throws(() => new RegionTracker("B", 3, borderGrid("B", 4)), /must be 5x5/);
    });

    it("should reject negative or fractional labels", () => {
      const grid = borderGrid("B", 2);
      grid[1][1] = -1;
      assert.throws(() => new RegionTracker("B", 2, grid), /non-negative integers/);
      grid[1][1] = 1.5;
      assert.throws(() => new RegionTracker("B", 2, grid), /non-negative integers/);
    });
  });

  describe("insert", () => {
    it("should give an isolated stone a fresh label", () => {
      const tracker = new RegionTracker("B", 5);

      assert.equal(tracker.insert(2, 2), 3);
      assert.equal(tracker.insert(2, 0), 4);
      assert.equal(tracker.nextLabel, 5);
      assert.equal(tracker.labelAt(2, 2), 3);
      assert.equal(tracker.labelAt(2, 0), 4);
    });

    it("should join a stone to an adjacent group", () => {
      const tracker = new RegionTracker("B", 5);
      tracker.insert(2, 2);

      // (1,3) is the upper-right hex neighbour of (2,2)
      assert.equal(tracker.insert(1, 3), 3);
      assert.equal(tracker.nextLabel, 4);
    });

    it("should not join square-diagonal cells that are not hex neighbours", () => {
      const tracker = new RegionTracker("B", 5);
      tracker.insert(2, 2);

      assert.equal(tracker.insert(1, 1), 4);
      assert.equal(tracker.insert(3, 3), 5);
    });

    it("should take the near-edge label on the first row for Black", () => {
      const tracker = new RegionTracker("B", 5);
      assert.equal(tracker.insert(0, 3), NEAR_EDGE);
    });

    it("should take the far-edge label on the last column for White", () => {
      const tracker = new RegionTracker("W", 5);
      assert.equal(tracker.insert(2, 4), FAR_EDGE);
    });

    it("should merge two disjoint groups through a bridging stone", () => {
      const tracker = new RegionTracker("B", 5);
      tracker.insert(2, 0);
      tracker.insert(3, 0);
      tracker.insert(2, 2);
      tracker.insert(2, 3);
      assert.equal(tracker.labelAt(3, 0), 3);
      assert.equal(tracker.labelAt(2, 3), 4);

      assert.equal(tracker.insert(2, 1), 3);

      for (const [row, col] of [[2, 0], [3, 0], [2, 1], [2, 2], [2, 3]]) {
        assert.equal(tracker.labelAt(row, col), 3);
      }
      assert.equal(labelsIn(tracker.toGrid()).has(4), false);
    });

    it("should keep the minimum label when a group reaches an edge", () => {
      const tracker = new RegionTracker("B", 5);
      tracker.insert(1, 2);
      tracker.insert(2, 2);
      assert.equal(tracker.labelAt(2, 2), 3);

      tracker.insert(0, 2);
      assert.equal(tracker.labelAt(1, 2), NEAR_EDGE);
      assert.equal(tracker.labelAt(2, 2), NEAR_EDGE);
      assert.equal(labelsIn(tracker.toGrid()).has(3), false);
    });
  });

  describe("isConnected", () => {
    it("should report Black connected once a column joins top and bottom", () => {
      const tracker = new RegionTracker("B", 3);
      tracker.insert(0, 0);
      assert.equal(tracker.isConnected(), false);
      tracker.insert(1, 0);
      assert.equal(tracker.isConnected(), false);
      tracker.insert(2, 0);
      assert.equal(tracker.isConnected(), true);
    });

    it("should relabel the far edge to the near edge when built from the bottom", () => {
      const tracker = new RegionTracker("B", 3);
      assert.equal(tracker.insert(2, 0), FAR_EDGE);
      assert.equal(tracker.insert(1, 0), FAR_EDGE);
      assert.equal(tracker.isConnected(), false);

      assert.equal(tracker.insert(0, 0), NEAR_EDGE);
      assert.equal(tracker.isConnected(), true);
      assert.equal(tracker.labelAt(2, 0), NEAR_EDGE);
      assert.equal(labelsIn(tracker.toGrid()).has(FAR_EDGE), false);
    });

    it("should report White connected once a row joins left and right", () => {
      const tracker = new RegionTracker("W", 3);
      tracker.insert(1, 0);
      tracker.insert(1, 1);
      assert.equal(tracker.isConnected(), false);
      tracker.insert(1, 2);
      assert.equal(tracker.isConnected(), true);
    });

    it("should not connect Black along a row", () => {
      const tracker = new RegionTracker("B", 3);
      tracker.insert(1, 0);
      tracker.insert(1, 1);
      tracker.insert(1, 2);
      assert.equal(tracker.isConnected(), false);
    });

    it("should connect either color with the only cell of a 1x1 board", () => {
      for (const color of ["B", "W"] as const) {
        const tracker = new RegionTracker(color, 1);
        assert.equal(tracker.insert(0, 0), NEAR_EDGE);
        assert.equal(tracker.isConnected(), true);
      }
    });
  });

  describe("clone", () => {
    it("should copy the grid and the label counter", () => {
      const tracker = new RegionTracker("B", 5);
      tracker.insert(2, 0);
      tracker.insert(2, 2);
      tracker.insert(2, 1);

      const copy = tracker.clone();
      assert.equal(copy.nextLabel, 5);
      assert.deepEqual(copy.toGrid(), tracker.toGrid());

      copy.insert(4, 4);
      assert.equal(copy.labelAt(4, 4), FAR_EDGE);
      assert.equal(tracker.labelAt(4, 4), NO_REGION);
    });
  });
});
