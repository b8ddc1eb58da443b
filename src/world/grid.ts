import type { Cell, Direction, GridBounds } from "../types";

export const DIRECTIONS = ["up", "down", "left", "right"] as const satisfies readonly Direction[];

export const DIRECTION_VECTORS: Readonly<Record<Direction, Cell>> = Object.freeze({
  up: Object.freeze({ x: 0, y: -1 }),
  down: Object.freeze({ x: 0, y: 1 }),
  left: Object.freeze({ x: -1, y: 0 }),
  right: Object.freeze({ x: 1, y: 0 })
});

export function assertBounds(bounds: GridBounds): void {
  if (!Number.isInteger(bounds.width) || !Number.isInteger(bounds.height)) {
    throw new RangeError(`grid bounds must be integers, got ${bounds.width}x${bounds.height}`);
  }
  if (bounds.width < 1 || bounds.height < 1) {
    throw new RangeError(`grid bounds must be positive, got ${bounds.width}x${bounds.height}`);
  }
}

export function wrapCoordinate(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export function wrapCell(cell: Cell, bounds: GridBounds): Cell {
  return {
    x: wrapCoordinate(cell.x, bounds.width),
    y: wrapCoordinate(cell.y, bounds.height)
  };
}

export function stepCell(cell: Cell, direction: Direction, bounds: GridBounds): Cell {
  const vector = DIRECTION_VECTORS[direction];
  return wrapCell({ x: cell.x + vector.x, y: cell.y + vector.y }, bounds);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isOppositeDirection(current: Direction, next: Direction): boolean {
  const a = DIRECTION_VECTORS[current];
  const b = DIRECTION_VECTORS[next];
  return a.x === -b.x && a.y === -b.y;
}

export function torusDelta(from: number, to: number, size: number): number {
  const forward = wrapCoordinate(to - from, size);
  return Math.min(forward, size - forward);
}

export function torusStepDistance(a: Cell, b: Cell, bounds: GridBounds): number {
  return torusDelta(a.x, b.x, bounds.width) + torusDelta(a.y, b.y, bounds.height);
}

export function areAdjacentOnTorus(a: Cell, b: Cell, bounds: GridBounds): boolean {
  return torusStepDistance(a, b, bounds) === 1;
}

export function boardCenter(bounds: GridBounds): Cell {
  return {
    x: Math.floor(bounds.width / 2),
    y: Math.floor(bounds.height / 2)
  };
}
