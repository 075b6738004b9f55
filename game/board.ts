import type {
  TileGrid,
  Tile,
  TileType,
  TileColor,
  Coord,
  GridOptions,
  RandomSource,
} from "./types";
import {
  MIN_GRID_SIZE,
  DEFAULT_WIDTH,
  DEFAULT_HEIGHT,
  EMPTY_TILE,
  INVALID_INDEX,
  TILE_LIST,
  TILE_VARIETY,
  MIN_VARIETY,
  TILE_LETTERS,
} from "./constants";
import { GridConfigError } from "../lib/errors";

/**
 * Simple seeded random for reproducibility (optional).
 */
export function mulberry32(seed: number): RandomSource {
  return function () {
    seed = (seed + 0x6d2b79f5) | 0;
    let t = seed;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomColor(grid: TileGrid): TileColor {
  return grid.colors[Math.floor(grid.rand() * grid.colors.length)];
}

function createTile(type: TileType): Tile {
  return { type, matched: false, checked: false };
}

/**
 * Sizes below 3 are raised to 3; anything that is not an integer is refused.
 */
export function clampSize(size: number, setting = "size"): number {
  if (!Number.isInteger(size)) {
    throw new GridConfigError(`must be an integer, got ${size}`, setting);
  }
  return size < MIN_GRID_SIZE ? MIN_GRID_SIZE : size;
}

function activeColors(variety: number): TileColor[] {
  if (!Number.isInteger(variety) || variety < MIN_VARIETY || variety > TILE_LIST.length) {
    throw new GridConfigError(
      `variety must be an integer between ${MIN_VARIETY} and ${TILE_LIST.length}, got ${variety}`,
      "variety"
    );
  }
  return TILE_LIST.slice(0, variety);
}

/**
 * Create an unfilled grid (every slot empty). Callers fill it through
 * initializeGrid or by direct assignment.
 */
export function createEmptyGrid(options: GridOptions = {}): TileGrid {
  const width = clampSize(options.width ?? DEFAULT_WIDTH, "width");
  const height = clampSize(options.height ?? DEFAULT_HEIGHT, "height");
  const rand =
    options.rand ?? (options.seed !== undefined ? mulberry32(options.seed) : Math.random);

  return {
    width,
    height,
    tiles: Array.from({ length: width * height }, () => createTile(EMPTY_TILE)),
    colors: activeColors(options.variety ?? TILE_VARIETY),
    rand,
    debug: options.debug ?? false,
  };
}

/**
 * Replace the tile array wholesale with freshly randomized tiles.
 */
export function fillRandom(grid: TileGrid, width: number, height: number): void {
  grid.width = clampSize(width, "width");
  grid.height = clampSize(height, "height");
  const tiles: Tile[] = [];
  for (let i = 0; i < grid.width * grid.height; i++) {
    tiles.push(createTile(randomColor(grid)));
  }
  grid.tiles = tiles;
}

/**
 * Build a grid by direct assignment from rows of tile types.
 * No solvability or match-free guarantee.
 */
export function gridFromRows(
  rows: TileType[][],
  options: Omit<GridOptions, "width" | "height"> = {}
): TileGrid {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  if (height < MIN_GRID_SIZE || width < MIN_GRID_SIZE) {
    throw new GridConfigError(
      `rows must describe at least ${MIN_GRID_SIZE}x${MIN_GRID_SIZE} tiles, got ${width}x${height}`,
      "rows"
    );
  }
  if (rows.some((row) => row.length !== width)) {
    throw new GridConfigError("every row must have the same length", "rows");
  }

  const grid = createEmptyGrid({ ...options, width, height });
  grid.tiles = rows.flat().map((type) => createTile(type));
  return grid;
}

export function gridToRows(grid: TileGrid): TileType[][] {
  const rows: TileType[][] = [];
  for (let y = 0; y < grid.height; y++) {
    rows.push(
      grid.tiles.slice(y * grid.width, (y + 1) * grid.width).map((tile) => tile.type)
    );
  }
  return rows;
}

/**
 * One line per row, one letter per tile.
 */
export function formatGrid(grid: TileGrid): string {
  return gridToRows(grid)
    .map((row) => row.map((type) => TILE_LETTERS[type]).join(" "))
    .join("\n");
}

function isValidIndex(grid: TileGrid, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < grid.tiles.length;
}

/**
 * Convert a grid coordinate into a flat tile index.
 */
export function tileIndex(grid: TileGrid, x: number, y: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return INVALID_INDEX;
  if (x < 0 || x >= grid.width || y < 0 || y >= grid.height) {
    return INVALID_INDEX;
  }
  return y * grid.width + x;
}

export function indexToCoord(grid: TileGrid, index: number): Coord {
  return { x: index % grid.width, y: Math.floor(index / grid.width) };
}

export function getTile(grid: TileGrid, index: number): Tile | undefined {
  return isValidIndex(grid, index) ? grid.tiles[index] : undefined;
}

export function getTileAt(grid: TileGrid, x: number, y: number): Tile | undefined {
  return getTile(grid, tileIndex(grid, x, y));
}

/**
 * Find where a tile currently sits. Linear scan; prefer passing indices.
 */
export function indexOfTile(grid: TileGrid, tile: Tile): number {
  return grid.tiles.indexOf(tile);
}

export function tileCoords(grid: TileGrid, tile: Tile): Coord {
  const index = indexOfTile(grid, tile);
  if (index === INVALID_INDEX) {
    return { x: INVALID_INDEX, y: INVALID_INDEX };
  }
  return indexToCoord(grid, index);
}

/**
 * Check if two slots are orthogonal neighbours.
 */
export function areAdjacent(grid: TileGrid, a: number, b: number): boolean {
  if (!isValidIndex(grid, a) || !isValidIndex(grid, b)) return false;
  const { x, y } = indexToCoord(grid, a);
  return (
    b === tileIndex(grid, x - 1, y) ||
    b === tileIndex(grid, x + 1, y) ||
    b === tileIndex(grid, x, y - 1) ||
    b === tileIndex(grid, x, y + 1)
  );
}

/**
 * Swap two slots (mutates). Out-of-range indices leave the grid untouched.
 */
export function swapTiles(grid: TileGrid, a: number, b: number): void {
  if (!isValidIndex(grid, a) || !isValidIndex(grid, b)) return;
  const temp = grid.tiles[a];
  grid.tiles[a] = grid.tiles[b];
  grid.tiles[b] = temp;
}

/**
 * Clear both flags and set the type of one slot.
 */
export function resetTile(grid: TileGrid, index: number, type: TileType = EMPTY_TILE): void {
  const tile = getTile(grid, index);
  if (!tile) return;
  tile.matched = false;
  tile.checked = false;
  tile.type = type;
}

/**
 * One gravity pass, bottom-right to top-left. Holes in the top row get a new
 * tile; any other hole trades places with the tile above it.
 * Returns the number of holes still waiting to be filled.
 */
export function applyGravityStep(grid: TileGrid): number {
  let holes = 0;
  for (let i = grid.tiles.length - 1; i >= 0; i--) {
    const tile = grid.tiles[i];
    if (tile.type !== EMPTY_TILE) continue;

    const { x, y } = indexToCoord(grid, i);
    if (y === 0) {
      tile.type = randomColor(grid);
    } else {
      swapTiles(grid, i, tileIndex(grid, x, y - 1));
      if (grid.tiles[i].type === EMPTY_TILE) {
        holes++;
      }
    }
  }
  return holes;
}

/**
 * Apply gravity passes until no hole is left. Returns the number of passes.
 */
export function settle(grid: TileGrid): number {
  let passes = 0;
  let holes: number;
  do {
    holes = applyGravityStep(grid);
    passes++;
  } while (holes > 0);
  return passes;
}
