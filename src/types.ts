export type GameState = "boot" | "playing" | "stopped";
export type Language = "en" | "ru";
export type Direction = "up" | "down" | "left" | "right";

export interface Cell {
  readonly x: number;
  readonly y: number;
}

export interface GridBounds {
  width: number;
  height: number;
}

export type RgbColor = readonly [red: number, green: number, blue: number];

export type DrawableKind = "snake" | "food";

export interface Drawable {
  readonly kind: DrawableKind;
  readonly color: RgbColor;
  occupiedCells(): readonly Cell[];
}

export interface DrawLayer {
  kind: DrawableKind;
  color: RgbColor;
  cells: Cell[];
}

export type InputEvent = { kind: "direction"; direction: Direction } | { kind: "quit" };

export interface GameConfig {
  screenWidth: number;
  screenHeight: number;
  cellSize: number;
  tickRate: number;
}

export interface Palette {
  background: RgbColor;
  border: RgbColor;
  snake: RgbColor;
  food: RgbColor;
}

export interface SessionSnapshot {
  bounds: GridBounds;
  body: Cell[];
  food: Cell;
  layers: DrawLayer[];
  direction: Direction;
  length: number;
  growthTarget: number;
  tick: number;
}

export interface SettingsState {
  language: Language;
  tickRate: number;
  boardWidth: number;
  boardHeight: number;
  colors: boolean;
}
