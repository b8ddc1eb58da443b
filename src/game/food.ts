import type { Cell, Drawable, GridBounds, RgbColor } from "../types";
import { randInt, type RandomFn } from "../util/random";
import { assertBounds } from "../world/grid";

export interface FoodConfig {
  bounds: GridBounds;
  color: RgbColor;
  random?: RandomFn;
}

export class Food implements Drawable {
  readonly kind = "food";
  readonly color: RgbColor;
  private readonly bounds: GridBounds;
  private readonly random: RandomFn;
  private cell: Cell = { x: 0, y: 0 };

  constructor(config: FoodConfig) {
    assertBounds(config.bounds);
    this.bounds = { ...config.bounds };
    this.color = config.color;
    this.random = config.random ?? Math.random;
    this.relocatePosition();
  }

  get position(): Cell {
    return this.cell;
  }

  occupiedCells(): readonly Cell[] {
    return [this.cell];
  }

  // No overlap check against the snake: food may land under the body.
  relocatePosition(): void {
    this.cell = {
      x: randInt(this.random, 0, this.bounds.width),
      y: randInt(this.random, 0, this.bounds.height)
    };
  }

  place(cell: Cell): void {
    this.cell = { x: cell.x, y: cell.y };
  }
}
