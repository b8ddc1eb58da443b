import type { Cell, Direction, Drawable, GridBounds, RgbColor } from "../types";
import { pickRandom, type RandomFn } from "../util/random";
import { DIRECTIONS, assertBounds, boardCenter, isOppositeDirection, stepCell } from "../world/grid";
import { checkSelfCollision } from "./collision-system";

export interface SnakeConfig {
  bounds: GridBounds;
  color: RgbColor;
  random?: RandomFn;
}

export type AdvanceResult =
  | { kind: "moved"; head: Cell; vacated: Cell | null }
  | { kind: "collided"; at: Cell };

export class Snake implements Drawable {
  readonly kind = "snake";
  readonly color: RgbColor;
  private readonly bounds: GridBounds;
  private readonly random: RandomFn;
  private cells: Cell[];
  private currentDirection: Direction = "right";
  private buffered: Direction | null = null;
  private target = 1;

  constructor(config: SnakeConfig) {
    assertBounds(config.bounds);
    this.bounds = { ...config.bounds };
    this.color = config.color;
    this.random = config.random ?? Math.random;
    this.cells = [boardCenter(this.bounds)];
  }

  get head(): Cell {
    return this.cells[0] ?? boardCenter(this.bounds);
  }

  get body(): readonly Cell[] {
    return [...this.cells];
  }

  get length(): number {
    return this.cells.length;
  }

  get direction(): Direction {
    return this.currentDirection;
  }

  get pendingDirection(): Direction | null {
    return this.buffered;
  }

  get growthTarget(): number {
    return this.target;
  }

  occupiedCells(): readonly Cell[] {
    return this.body;
  }

  bufferDirection(direction: Direction): void {
    this.buffered = direction;
  }

  commitDirection(): void {
    if (this.buffered === null) {
      return;
    }
    if (isOppositeDirection(this.currentDirection, this.buffered)) {
      return;
    }
    this.currentDirection = this.buffered;
    this.buffered = null;
  }

  advance(): AdvanceResult {
    const nextHead = stepCell(this.head, this.currentDirection, this.bounds);
    if (checkSelfCollision(nextHead, this.cells)) {
      this.reset();
      return { kind: "collided", at: nextHead };
    }

    this.cells.unshift(nextHead);
    const vacated = this.cells.length > this.target ? this.cells.pop() ?? null : null;
    return { kind: "moved", head: nextHead, vacated };
  }

  grow(): void {
    this.target += 1;
  }

  reset(): void {
    this.cells = [boardCenter(this.bounds)];
    this.target = 1;
    this.buffered = null;
    this.currentDirection = pickRandom(this.random, DIRECTIONS);
  }

  place(body: readonly Cell[], direction: Direction, growthTarget = body.length): void {
    if (body.length === 0) {
      throw new RangeError("snake body must contain at least one cell");
    }
    if (growthTarget < body.length) {
      throw new RangeError(`growth target ${growthTarget} is shorter than body length ${body.length}`);
    }
    this.cells = body.map((cell) => ({ x: cell.x, y: cell.y }));
    this.currentDirection = direction;
    this.target = growthTarget;
    this.buffered = null;
  }
}
