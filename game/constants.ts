import type { TileColor, TileType } from "./types";

export const MIN_GRID_SIZE = 3;
export const DEFAULT_WIDTH = 7;
export const DEFAULT_HEIGHT = 6;

export const EMPTY_TILE: TileType = "NONE";

// Returned by coordinate and tile lookups that fall outside the grid
export const INVALID_INDEX = -1;

// Full list of available colors (in priority order)
export const TILE_LIST: TileColor[] = ["RED", "YELLOW", "GREEN", "BLUE", "PURPLE"];

// Fewer colors = easier matching. Below 2 no board can be made match-free.
export const MIN_VARIETY = 2;
export const TILE_VARIETY = TILE_LIST.length;

// One-letter names used by formatGrid
export const TILE_LETTERS: Record<TileType, string> = {
  NONE: ".",
  RED: "R",
  YELLOW: "Y",
  GREEN: "G",
  BLUE: "B",
  PURPLE: "P",
};
