// Re-export public API
export type {
  TileColor,
  TileType,
  Coord,
  RandomSource,
  Tile,
  TileGrid,
  GridOptions,
  CascadeResult,
  CascadeListener,
  MoveResult,
  HintMove,
} from "./types";

export {
  MIN_GRID_SIZE,
  DEFAULT_WIDTH,
  DEFAULT_HEIGHT,
  EMPTY_TILE,
  INVALID_INDEX,
  TILE_LIST,
  TILE_VARIETY,
} from "./constants";

export {
  createGrid,
  initializeGrid,
  runCascade,
  findCandidateMoves,
  isSolvable,
  findHintMove,
  applySwap,
} from "./engine";

export {
  mulberry32,
  createEmptyGrid,
  gridFromRows,
  gridToRows,
  formatGrid,
  tileIndex,
  getTile,
  getTileAt,
  indexOfTile,
  tileCoords,
  areAdjacent,
  swapTiles,
  resetTile,
  applyGravityStep,
  settle,
} from "./board";

export { detectMatches, claimMatches, clearFlags, hasAnyMatch, wouldMatch } from "./matches";

export { loadGridConfig, type GridConfig } from "./config";
export { GridConfigError, formatError } from "../lib/errors";
