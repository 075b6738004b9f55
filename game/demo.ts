/**
 * Seeded self-play session for watching the engine from a terminal.
 * Run via: npm run demo (GRID_* variables and .env files are honoured)
 */
import { loadGridConfig, toGridOptions, type GridConfig } from "./config";
import { createGrid, applySwap, findHintMove } from "./engine";
import { formatGrid } from "./board";
import { formatError } from "../lib/errors";

export type DemoSummary = {
  moves: number;
  matched: number;
  chains: number;
  reshuffles: number;
};

export function runDemo(config: GridConfig, log: (line: string) => void = console.log): DemoSummary {
  const grid = createGrid(toGridOptions(config));
  const summary: DemoSummary = { moves: 0, matched: 0, chains: 0, reshuffles: 0 };

  log(`[demo] ${grid.width}x${grid.height} board, ${grid.colors.length} colors`);
  log(formatGrid(grid));

  while (summary.moves < config.moves) {
    const hint = findHintMove(grid);
    if (!hint) break;

    const result = applySwap(grid, hint.from, hint.to);
    if (!result.valid) break;

    summary.moves++;
    summary.matched += result.matched;
    summary.chains += result.chains;
    if (result.reshuffled) summary.reshuffles++;

    log(
      `[demo] Move ${summary.moves}: ${hint.from} <-> ${hint.to}, matched ${result.matched}, chains ${result.chains}${
        result.reshuffled ? " (reshuffled)" : ""
      }`
    );
    log(formatGrid(grid));
  }

  log(
    `[demo] Done: ${summary.moves} moves, ${summary.matched} tiles matched, ${summary.chains} chains`
  );
  return summary;
}

// Auto-run if executed directly
if (typeof require !== "undefined" && require.main === module) {
  try {
    runDemo(loadGridConfig());
  } catch (err: unknown) {
    console.error(`[demo] ${formatError(err)}`);
    process.exitCode = 1;
  }
}
