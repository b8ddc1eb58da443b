import { BOARD_BOUNDS, PALETTE } from "../config/game-config";
import type { Cell, DrawLayer, Drawable, GridBounds, InputEvent, Palette, SessionSnapshot } from "../types";
import type { RandomFn } from "../util/random";
import { checkFoodCollision } from "./collision-system";
import { Food } from "./food";
import { Snake } from "./snake";

export interface SessionEvents {
  onFoodEaten?: (head: Cell, growthTarget: number) => void;
  onReset?: (collidedAt: Cell, lengthBefore: number) => void;
}

export interface SessionOptions {
  bounds?: GridBounds;
  palette?: Palette;
  random?: RandomFn;
}

export interface SessionTickResult {
  quit: boolean;
  reset: boolean;
  ateFood: boolean;
}

function toLayer(drawable: Drawable): DrawLayer {
  return {
    kind: drawable.kind,
    color: drawable.color,
    cells: drawable.occupiedCells().map((cell) => ({ x: cell.x, y: cell.y }))
  };
}

export class GameSession {
  readonly snake: Snake;
  readonly food: Food;
  readonly bounds: GridBounds;

  private tickCount = 0;
  private readonly events: SessionEvents;

  constructor(events: SessionEvents = {}, options: SessionOptions = {}) {
    this.events = events;
    this.bounds = { ...(options.bounds ?? BOARD_BOUNDS) };
    const palette = options.palette ?? PALETTE;
    const random = options.random ?? Math.random;
    this.snake = new Snake({ bounds: this.bounds, color: palette.snake, random });
    this.food = new Food({ bounds: this.bounds, color: palette.food, random });
  }

  get ticks(): number {
    return this.tickCount;
  }

  tick(input: readonly InputEvent[]): SessionTickResult {
    let quit = false;
    for (const event of input) {
      if (event.kind === "quit") {
        quit = true;
      } else {
        this.snake.bufferDirection(event.direction);
      }
    }
    if (quit) {
      return { quit: true, reset: false, ateFood: false };
    }

    this.tickCount += 1;
    this.snake.commitDirection();

    const lengthBefore = this.snake.length;
    const step = this.snake.advance();
    if (step.kind === "collided") {
      this.events.onReset?.(step.at, lengthBefore);
      return { quit: false, reset: true, ateFood: false };
    }

    if (!checkFoodCollision(step.head, this.food.position)) {
      return { quit: false, reset: false, ateFood: false };
    }

    this.snake.grow();
    this.food.relocatePosition();
    this.events.onFoodEaten?.(step.head, this.snake.growthTarget);
    return { quit: false, reset: false, ateFood: true };
  }

  getSnapshot(): SessionSnapshot {
    return {
      bounds: { ...this.bounds },
      body: [...this.snake.body],
      food: { ...this.food.position },
      layers: [this.food, this.snake].map(toLayer),
      direction: this.snake.direction,
      length: this.snake.length,
      growthTarget: this.snake.growthTarget,
      tick: this.tickCount
    };
  }
}
