// Tile colors used in the game
export type TileColor = "RED" | "YELLOW" | "GREEN" | "BLUE" | "PURPLE";

// "NONE" marks a hole waiting for gravity to fill it
export type TileType = TileColor | "NONE";

export type Coord = { x: number; y: number };

// Uniform random number in [0, 1)
export type RandomSource = () => number;

// Tiles carry no position; their slot in the grid is their position
export type Tile = {
  type: TileType;
  matched: boolean; // set by detection, cleared by claiming
  checked: boolean; // visited as a center during the current sweep
};

// Row-major grid of width * height tiles
export type TileGrid = {
  width: number;
  height: number;
  tiles: Tile[];
  colors: TileColor[];
  rand: RandomSource;
  debug: boolean;
};

export type GridOptions = {
  width?: number;
  height?: number;
  // Number of active colors taken from the front of TILE_LIST
  variety?: number;
  seed?: number;
  rand?: RandomSource;
  debug?: boolean;
};

export type CascadeResult = {
  matched: number;
  chains: number;
};

// Receives every scoring round that claimed tiles
export type CascadeListener = {
  onMatch(claimed: number, chain: number): void;
};

export type MoveResult = CascadeResult & {
  valid: boolean;
  reshuffled: boolean;
};

export type HintMove = { from: number; to: number };
