import { describe, it, expect } from "vitest";
import {
  createEmptyGrid,
  gridFromRows,
  gridToRows,
  formatGrid,
  tileIndex,
  indexToCoord,
  getTile,
  getTileAt,
  indexOfTile,
  tileCoords,
  areAdjacent,
  swapTiles,
  resetTile,
  applyGravityStep,
  settle,
  mulberry32,
} from "./board";
import { INVALID_INDEX } from "./constants";
import { GridConfigError } from "../lib/errors";
import type { TileType } from "./types";

const R: TileType = "RED";
const Y: TileType = "YELLOW";
const G: TileType = "GREEN";
const B: TileType = "BLUE";
const P: TileType = "PURPLE";
const _: TileType = "NONE";

describe("grid construction", () => {
  it("clamps dimensions below 3", () => {
    const grid = createEmptyGrid({ width: 1, height: 2 });
    expect(grid.width).toBe(3);
    expect(grid.height).toBe(3);
    expect(grid.tiles).toHaveLength(9);
  });

  it("takes active colors from the front of the tile list", () => {
    expect(createEmptyGrid({ variety: 3 }).colors).toEqual(["RED", "YELLOW", "GREEN"]);
  });

  it("rejects fewer than two colors", () => {
    expect(() => createEmptyGrid({ variety: 1 })).toThrow(GridConfigError);
    expect(() => createEmptyGrid({ variety: 6 })).toThrow(GridConfigError);
  });

  it("rejects sizes that are not integers", () => {
    expect(() => createEmptyGrid({ width: NaN, height: 3 })).toThrow(
      "width: must be an integer, got NaN"
    );
    expect(() => createEmptyGrid({ width: 4, height: 3.5 })).toThrow(
      "height: must be an integer, got 3.5"
    );
    expect(() => createEmptyGrid({ width: Infinity })).toThrow(GridConfigError);
  });

  it("builds a grid from rows", () => {
    const rows = [
      [R, Y, G, B],
      [B, P, R, Y],
      [G, G, B, R],
    ];
    const grid = gridFromRows(rows);
    expect(grid.width).toBe(4);
    expect(grid.height).toBe(3);
    expect(gridToRows(grid)).toEqual(rows);
    expect(grid.tiles.every((tile) => !tile.matched && !tile.checked)).toBe(true);
  });

  it("rejects rows that are too small or ragged", () => {
    expect(() =>
      gridFromRows([
        [R, Y, G],
        [B, P, R],
      ])
    ).toThrow("rows: rows must describe at least 3x3 tiles, got 3x2");
    expect(() => gridFromRows([[R, Y, G], [B, P], [G, B, R]])).toThrow(
      "rows: every row must have the same length"
    );
  });

  it("formats one letter per tile", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, _],
      [R, R, R],
    ]);
    expect(formatGrid(grid)).toBe("R Y G\nB P .\nR R R");
  });

  it("produces the same sequence for the same seed", () => {
    const a = mulberry32(99);
    const b = mulberry32(99);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it("keeps its state in 32 bits over long runs", () => {
    const draws = 5_000_000;
    const long = mulberry32(0);
    for (let i = 0; i < draws; i++) long();
    const fresh = mulberry32(Math.imul(draws, 0x6d2b79f5));
    expect([long(), long(), long()]).toEqual([fresh(), fresh(), fresh()]);
  });
});

describe("indexing", () => {
  const grid = createEmptyGrid({ width: 4, height: 3 });

  it("maps coordinates row-major", () => {
    expect(tileIndex(grid, 0, 0)).toBe(0);
    expect(tileIndex(grid, 2, 1)).toBe(6);
    expect(tileIndex(grid, 3, 2)).toBe(11);
    expect(indexToCoord(grid, 6)).toEqual({ x: 2, y: 1 });
  });

  it("returns the invalid index outside the grid", () => {
    expect(tileIndex(grid, -1, 0)).toBe(INVALID_INDEX);
    expect(tileIndex(grid, 4, 0)).toBe(INVALID_INDEX);
    expect(tileIndex(grid, 0, 3)).toBe(INVALID_INDEX);
    expect(tileIndex(grid, 0, -1)).toBe(INVALID_INDEX);
  });

  it("returns the invalid index for fractional coordinates", () => {
    expect(tileIndex(grid, 0.5, 0)).toBe(INVALID_INDEX);
    expect(tileIndex(grid, 1, 1.5)).toBe(INVALID_INDEX);
    expect(getTileAt(grid, 0.5, 0)).toBeUndefined();
  });

  it("treats out-of-range tiles as absent", () => {
    expect(getTile(grid, -1)).toBeUndefined();
    expect(getTile(grid, 12)).toBeUndefined();
    expect(getTile(grid, 1.5)).toBeUndefined();
    expect(getTileAt(grid, 4, 0)).toBeUndefined();
    expect(getTileAt(grid, 1, 2)).toBe(grid.tiles[9]);
  });

  it("finds a tile by reference", () => {
    const square = createEmptyGrid({ width: 3, height: 3 });
    const tile = square.tiles[5];
    expect(indexOfTile(square, tile)).toBe(5);
    expect(tileCoords(square, tile)).toEqual({ x: 2, y: 1 });

    const stranger = { type: R, matched: false, checked: false };
    expect(indexOfTile(square, stranger)).toBe(INVALID_INDEX);
    expect(tileCoords(square, stranger)).toEqual({ x: INVALID_INDEX, y: INVALID_INDEX });
  });

  it("follows a tile after it is swapped", () => {
    const square = createEmptyGrid({ width: 3, height: 3 });
    const tile = square.tiles[0];
    swapTiles(square, 0, 4);
    expect(indexOfTile(square, tile)).toBe(4);
  });
});

describe("adjacency", () => {
  const grid = createEmptyGrid({ width: 3, height: 3 });

  it("accepts orthogonal neighbours only", () => {
    expect(areAdjacent(grid, 0, 1)).toBe(true);
    expect(areAdjacent(grid, 4, 7)).toBe(true);
    expect(areAdjacent(grid, 2, 3)).toBe(false); // row wrap
    expect(areAdjacent(grid, 0, 4)).toBe(false); // diagonal
    expect(areAdjacent(grid, 0, 0)).toBe(false);
    expect(areAdjacent(grid, 0, 2)).toBe(false);
  });

  it("rejects invalid indices", () => {
    expect(areAdjacent(grid, -1, 0)).toBe(false);
    expect(areAdjacent(grid, 0, -1)).toBe(false);
    expect(areAdjacent(grid, 8, 9)).toBe(false);
  });

  it("is symmetric", () => {
    for (let i = 0; i < 9; i++) {
      for (let j = 0; j < 9; j++) {
        expect(areAdjacent(grid, i, j)).toBe(areAdjacent(grid, j, i));
      }
    }
  });
});

describe("swapTiles", () => {
  it("exchanges two slots", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
    const first = grid.tiles[0];
    const last = grid.tiles[8];
    swapTiles(grid, 0, 8);
    expect(grid.tiles[0]).toBe(last);
    expect(grid.tiles[8]).toBe(first);
  });

  it("ignores out-of-range indices", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
    const before = [...grid.tiles];
    swapTiles(grid, -1, 0);
    swapTiles(grid, 0, 9);
    swapTiles(grid, 9, 10);
    expect(grid.tiles).toEqual(before);
    grid.tiles.forEach((tile, i) => expect(tile).toBe(before[i]));
  });
});

describe("resetTile", () => {
  it("clears flags and sets the type", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
    grid.tiles[4].matched = true;
    grid.tiles[4].checked = true;
    resetTile(grid, 4);
    expect(grid.tiles[4]).toEqual({ type: "NONE", matched: false, checked: false });
    resetTile(grid, 4, G);
    expect(grid.tiles[4].type).toBe("GREEN");
  });

  it("ignores invalid indices", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
    resetTile(grid, 9);
    expect(gridToRows(grid)).toEqual([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
  });
});

describe("gravity", () => {
  const holeyRows = (): TileType[][] => [
    [R, Y, G],
    [_, Y, G],
    [_, B, P],
  ];

  it("moves holes up one pass at a time and fills the top row", () => {
    const grid = gridFromRows(holeyRows(), { rand: () => 0 });

    expect(applyGravityStep(grid)).toBe(1);
    expect(gridToRows(grid)).toEqual([
      [R, Y, G],
      [R, Y, G],
      [_, B, P],
    ]);

    expect(applyGravityStep(grid)).toBe(0);
    expect(gridToRows(grid)).toEqual([
      [R, Y, G],
      [R, Y, G],
      [R, B, P],
    ]);
  });

  it("settles in as many passes as needed", () => {
    const grid = gridFromRows(holeyRows(), { rand: () => 0 });
    expect(settle(grid)).toBe(2);
    expect(grid.tiles.some((tile) => tile.type === "NONE")).toBe(false);
  });

  it("takes a single pass on a full grid", () => {
    const grid = gridFromRows([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
    expect(settle(grid)).toBe(1);
    expect(gridToRows(grid)).toEqual([
      [R, Y, G],
      [B, P, R],
      [Y, G, B],
    ]);
  });

  it("fills an empty grid within height passes", () => {
    const grid = createEmptyGrid({ width: 4, height: 5, seed: 11 });
    expect(grid.tiles.every((tile) => tile.type === "NONE")).toBe(true);
    expect(settle(grid)).toBeLessThanOrEqual(grid.height);
    expect(grid.tiles.some((tile) => tile.type === "NONE")).toBe(false);
  });

  it("keeps surviving tiles in column order", () => {
    const grid = gridFromRows(
      [
        [R, Y, G],
        [B, _, G],
        [P, _, R],
      ],
      { rand: () => 0.9 }
    );
    settle(grid);
    expect(gridToRows(grid)).toEqual([
      [R, P, G],
      [B, P, G],
      [P, Y, R],
    ]);
  });
});
