import type { TileGrid } from "./types";
import { EMPTY_TILE } from "./constants";
import { getTile, getTileAt, indexToCoord } from "./board";

/**
 * Mark a run of three centered on this slot, vertically or horizontally.
 * Only the immediate neighbours are looked at; the full sweep in
 * detectMatches covers longer runs through their other centers.
 */
function checkTileForMatch(grid: TileGrid, index: number): void {
  const tile = getTile(grid, index);
  if (!tile) return;
  tile.checked = true;

  const { x, y } = indexToCoord(grid, index);
  const above = getTileAt(grid, x, y - 1);
  const below = getTileAt(grid, x, y + 1);
  const left = getTileAt(grid, x - 1, y);
  const right = getTileAt(grid, x + 1, y);

  if (above && below && above.type === tile.type && below.type === tile.type) {
    tile.matched = true;
    above.matched = true;
    below.matched = true;
  }

  if (left && right && left.type === tile.type && right.type === tile.type) {
    tile.matched = true;
    left.matched = true;
    right.matched = true;
  }
}

/**
 * Sweep the grid once and flag every tile that is part of a run of 3+.
 */
export function detectMatches(grid: TileGrid): void {
  for (let i = 0; i < grid.tiles.length; i++) {
    if (!grid.tiles[i].checked) {
      checkTileForMatch(grid, i);
    }
  }
}

/**
 * Empty every flagged tile. Returns how many were cleared.
 */
export function claimMatches(grid: TileGrid): number {
  let claimed = 0;
  for (const tile of grid.tiles) {
    if (tile.matched) {
      claimed++;
      tile.type = EMPTY_TILE;
      tile.matched = false;
      tile.checked = false;
    }
  }
  return claimed;
}

export function clearFlags(grid: TileGrid): void {
  for (const tile of grid.tiles) {
    tile.matched = false;
    tile.checked = false;
  }
}

/**
 * Only meaningful between detectMatches and claimMatches/clearFlags.
 */
export function hasAnyMatch(grid: TileGrid): boolean {
  return grid.tiles.some((tile) => tile.matched);
}

/**
 * Check whether the tile at `index` is part of a run of three, reading the
 * grid directly instead of the sweep flags. Unlike the sweep, the tile may sit
 * at either end of the run, so neighbours two slots away are looked at too.
 */
export function wouldMatch(grid: TileGrid, index: number): boolean {
  const tile = getTile(grid, index);
  if (!tile) return false;

  const { x, y } = indexToCoord(grid, index);
  const same = (dx: number, dy: number) => getTileAt(grid, x + dx, y + dy)?.type === tile.type;

  // Centered runs
  if (same(0, -1) && same(0, 1)) return true;
  if (same(-1, 0) && same(1, 0)) return true;

  // Tile at the end of a run
  if (same(0, -1) && same(0, -2)) return true;
  if (same(0, 1) && same(0, 2)) return true;
  if (same(-1, 0) && same(-2, 0)) return true;
  if (same(1, 0) && same(2, 0)) return true;

  return false;
}
