import type { GameConfig, GridBounds, Palette } from "../types";

export const GAME_CONFIG: GameConfig = {
  screenWidth: 640,
  screenHeight: 480,
  cellSize: 20,
  tickRate: 20
};

export const BOARD_BOUNDS: GridBounds = {
  width: Math.floor(GAME_CONFIG.screenWidth / GAME_CONFIG.cellSize),
  height: Math.floor(GAME_CONFIG.screenHeight / GAME_CONFIG.cellSize)
};

export const PALETTE: Palette = {
  background: [0, 0, 0],
  border: [93, 216, 228],
  snake: [0, 255, 0],
  food: [255, 0, 0]
};

// Each cell spans two terminal columns.
export const CELL_GLYPHS = {
  empty: "  ",
  snake: "██",
  food: "▒▒"
};

export const SETTINGS_LIMITS = {
  minTickRate: 1,
  maxTickRate: 60,
  minBoardSide: 4,
  maxBoardSide: 200
};
