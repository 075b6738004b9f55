import "../lib/env";
import { GridConfigError } from "../lib/errors";
import { DEFAULT_WIDTH, DEFAULT_HEIGHT, TILE_VARIETY, MIN_VARIETY } from "./constants";
import type { GridOptions } from "./types";

export const DEFAULT_DEMO_MOVES = 10;

export type GridConfig = {
  width: number;
  height: number;
  variety: number;
  seed?: number;
  debug: boolean;
  // Moves played by the demo runner
  moves: number;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number;
function readInt(env: Env, name: string): number | undefined;
function readInt(env: Env, name: string, fallback?: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new GridConfigError(`expected an integer, got "${raw}"`, name);
  }
  return Number(raw);
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true";
}

/**
 * Read grid settings from the environment (.env files are loaded first).
 * Width and height below 3 are passed through; the engine clamps them.
 */
export function loadGridConfig(env: Env = process.env): GridConfig {
  const variety = readInt(env, "GRID_VARIETY", TILE_VARIETY);
  if (variety < MIN_VARIETY || variety > TILE_VARIETY) {
    throw new GridConfigError(
      `must be between ${MIN_VARIETY} and ${TILE_VARIETY}, got ${variety}`,
      "GRID_VARIETY"
    );
  }

  const moves = readInt(env, "DEMO_MOVES", DEFAULT_DEMO_MOVES);
  if (moves < 0) {
    throw new GridConfigError(`must not be negative, got ${moves}`, "DEMO_MOVES");
  }

  return {
    width: readInt(env, "GRID_WIDTH", DEFAULT_WIDTH),
    height: readInt(env, "GRID_HEIGHT", DEFAULT_HEIGHT),
    variety,
    seed: readInt(env, "GRID_SEED"),
    debug: readFlag(env, "GRID_DEBUG"),
    moves,
  };
}

export function toGridOptions(config: GridConfig): GridOptions {
  return {
    width: config.width,
    height: config.height,
    variety: config.variety,
    seed: config.seed,
    debug: config.debug,
  };
}
