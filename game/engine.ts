import type {
  TileGrid,
  GridOptions,
  CascadeResult,
  CascadeListener,
  MoveResult,
  HintMove,
} from "./types";
import {
  createEmptyGrid,
  fillRandom,
  swapTiles,
  areAdjacent,
  tileIndex,
  indexToCoord,
  settle,
} from "./board";
import { INVALID_INDEX } from "./constants";
import { detectMatches, claimMatches, clearFlags, wouldMatch } from "./matches";

/**
 * Create a grid and fill it with a solvable, match-free board.
 */
export function createGrid(options: GridOptions = {}): TileGrid {
  const grid = createEmptyGrid(options);
  initializeGrid(grid, grid.width, grid.height);
  return grid;
}

/**
 * (Re)build the board. Every attempt is a fresh random board, cleaned of
 * accidental matches; attempts with no legal move are thrown away.
 */
export function initializeGrid(grid: TileGrid, width: number, height: number): void {
  let attempts = 0;
  do {
    fillRandom(grid, width, height);
    runCascade(grid, false);
    attempts++;
  } while (!isSolvable(grid));

  if (grid.debug) {
    console.log(
      `[grid] Initialized ${grid.width}x${grid.height} board after ${attempts} attempt(s)`
    );
  }
}

/**
 * Resolve every match on the board and let tiles fall until nothing matches.
 * The first round that claims tiles is chain 0; each further round adds one.
 */
export function runCascade(
  grid: TileGrid,
  countScores = true,
  listener?: CascadeListener
): CascadeResult {
  let matched = 0;
  let chain = -1; // first matches don't count as a chain
  let chains = 0;
  let claimed: number;

  do {
    detectMatches(grid);
    claimed = claimMatches(grid);
    clearFlags(grid);
    settle(grid);
    if (countScores && claimed > 0) {
      matched += claimed;
      chain++;
      chains = chain;
      listener?.onMatch(claimed, chain);
    }
  } while (claimed > 0);

  return { matched, chains };
}

// Up, down, left, right; slots off the grid are skipped
function neighbourSlots(grid: TileGrid, index: number): number[] {
  const { x, y } = indexToCoord(grid, index);
  return [
    tileIndex(grid, x, y - 1),
    tileIndex(grid, x, y + 1),
    tileIndex(grid, x - 1, y),
    tileIndex(grid, x + 1, y),
  ].filter((slot) => slot !== INVALID_INDEX);
}

// Every swap with a neighbour that would put slot `from` in a run
function* candidateSwaps(grid: TileGrid): Generator<HintMove> {
  for (let from = 0; from < grid.tiles.length; from++) {
    for (const to of neighbourSlots(grid, from)) {
      swapTiles(grid, from, to);
      const match = wouldMatch(grid, from);
      swapTiles(grid, from, to);
      if (match) {
        yield { from, to };
      }
    }
  }
}

/**
 * List every neighbour slot whose swap with some slot would make a match.
 * Each slot tries up, down, left, right; duplicates are kept.
 */
export function findCandidateMoves(grid: TileGrid): number[] {
  return Array.from(candidateSwaps(grid), (move) => move.to);
}

export function isSolvable(grid: TileGrid): boolean {
  return findCandidateMoves(grid).length > 0;
}

/**
 * Find a hint move (first candidate found), as the pair of slots to swap.
 */
export function findHintMove(grid: TileGrid): HintMove | null {
  for (const move of candidateSwaps(grid)) {
    return move;
  }
  return null;
}

/**
 * Play a player move: swap two adjacent slots and resolve the cascade, or
 * put the tiles back when the swap makes no match.
 * A board left without legal moves is rebuilt at the same size.
 */
export function applySwap(
  grid: TileGrid,
  from: number,
  to: number,
  listener?: CascadeListener
): MoveResult {
  const rejected: MoveResult = { valid: false, matched: 0, chains: 0, reshuffled: false };

  if (!areAdjacent(grid, from, to)) {
    return rejected;
  }

  swapTiles(grid, from, to);
  if (!wouldMatch(grid, from) && !wouldMatch(grid, to)) {
    swapTiles(grid, from, to);
    if (grid.debug) {
      console.log("[grid] No matches.");
    }
    return rejected;
  }

  const { matched, chains } = runCascade(grid, true, listener);
  if (grid.debug) {
    console.log(`[grid] Matches: ${matched}, Chains: ${chains}`);
  }

  let reshuffled = false;
  if (!isSolvable(grid)) {
    initializeGrid(grid, grid.width, grid.height);
    reshuffled = true;
    if (grid.debug) {
      console.log("[grid] No moves left, board reshuffled");
    }
  }

  return { valid: true, matched, chains, reshuffled };
}
