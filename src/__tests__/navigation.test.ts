import { describe, expect, it } from "vitest";
import { cursorToGrid, isNavigationDirection, moveCursorBy } from "../core/navigation.js";

describe("moveCursorBy", () => {
  const extent = { candles: 10 };

  it("moves one candle or one row at a time", () => {
    expect(moveCursorBy({ row: 5, col: 5 }, "right", extent)).toEqual({ row: 5, col: 6 });
    expect(moveCursorBy({ row: 5, col: 5 }, "left", extent)).toEqual({ row: 5, col: 4 });
    expect(moveCursorBy({ row: 5, col: 5 }, "up", extent)).toEqual({ row: 4, col: 5 });
    expect(moveCursorBy({ row: 5, col: 5 }, "down", extent)).toEqual({ row: 6, col: 5 });
  });

  it("stays inside the chart", () => {
    expect(moveCursorBy({ row: 0, col: 0 }, "left", extent)).toEqual({ row: 0, col: 0 });
    expect(moveCursorBy({ row: 0, col: 0 }, "up", extent)).toEqual({ row: 0, col: 0 });
    expect(moveCursorBy({ row: 9, col: 9 }, "right", extent)).toEqual({ row: 9, col: 9 });
    expect(moveCursorBy({ row: 9, col: 9 }, "down", extent)).toEqual({ row: 9, col: 9 });
  });

  it("handles a single candle and a single row", () => {
    expect(moveCursorBy({ row: 0, col: 0 }, "right", { candles: 1 })).toEqual({ row: 0, col: 0 });
    expect(moveCursorBy({ row: 0, col: 0 }, "down", { candles: 1, height: 1 })).toEqual({ row: 0, col: 0 });
  });

  it("follows a sequence of moves", () => {
    let cursor = { row: 0, col: 0 };
    for (let i = 0; i < 3; i++) cursor = moveCursorBy(cursor, "right", extent);
    for (let i = 0; i < 5; i++) cursor = moveCursorBy(cursor, "down", extent);
    for (let i = 0; i < 2; i++) cursor = moveCursorBy(cursor, "left", extent);

    expect(cursor).toEqual({ row: 5, col: 1 });
  });
});

describe("cursorToGrid", () => {
  it("puts the cursor on the candle's center column", () => {
    expect(cursorToGrid({ row: 0, col: 0 })).toEqual({ line: 1, column: 1 });
    expect(cursorToGrid({ row: 5, col: 2 })).toEqual({ line: 6, column: 7 });
    expect(cursorToGrid({ row: 9, col: 9 })).toEqual({ line: 10, column: 28 });
  });
});

describe("isNavigationDirection", () => {
  it("accepts the four arrows only", () => {
    expect(isNavigationDirection("up")).toBe(true);
    expect(isNavigationDirection("sideways")).toBe(false);
  });
});
