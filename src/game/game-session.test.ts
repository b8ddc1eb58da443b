import { describe, expect, it, vi } from "vitest";
import { seededRandom } from "../util/random";
import { GameSession } from "./game-session";

const bounds = { width: 32, height: 24 };

describe("game-session", () => {
  it("eats food one cell ahead and lets growth lag a tick", () => {
    const session = new GameSession({}, { bounds, random: seededRandom(5) });
    session.food.place({ x: 17, y: 12 });
    const grow = vi.spyOn(session.snake, "grow");
    const relocate = vi.spyOn(session.food, "relocatePosition");

    const result = session.tick([]);

    expect(result).toEqual({ quit: false, reset: false, ateFood: true });
    expect(session.snake.head).toEqual({ x: 17, y: 12 });
    expect(grow).toHaveBeenCalledTimes(1);
    expect(relocate).toHaveBeenCalledTimes(1);
    expect(session.snake.length).toBe(1);
    expect(session.snake.growthTarget).toBe(2);
  });

  it("applies only the last direction pressed within a tick", () => {
    const session = new GameSession({}, { bounds, random: seededRandom(1) });
    session.food.place({ x: 0, y: 0 });
    session.tick([
      { kind: "direction", direction: "up" },
      { kind: "direction", direction: "down" }
    ]);
    expect(session.snake.direction).toBe("down");
    expect(session.snake.head).toEqual({ x: 16, y: 13 });
  });

  it("stops before moving when quit arrives", () => {
    const session = new GameSession({}, { bounds, random: seededRandom(1) });
    const result = session.tick([{ kind: "direction", direction: "up" }, { kind: "quit" }]);
    expect(result).toEqual({ quit: true, reset: false, ateFood: false });
    expect(session.snake.head).toEqual({ x: 16, y: 12 });
    expect(session.ticks).toBe(0);
  });

  it("resets silently on self-collision and skips the food check", () => {
    const onReset = vi.fn();
    const onFoodEaten = vi.fn();
    const session = new GameSession({ onReset, onFoodEaten }, { bounds, random: () => 0 });
    session.snake.place(
      [
        { x: 5, y: 5 },
        { x: 6, y: 5 },
        { x: 6, y: 6 },
        { x: 5, y: 6 }
      ],
      "down"
    );
    session.food.place({ x: 5, y: 6 });

    const result = session.tick([]);

    expect(result).toEqual({ quit: false, reset: true, ateFood: false });
    expect(onReset).toHaveBeenCalledWith({ x: 5, y: 6 }, 4);
    expect(onFoodEaten).not.toHaveBeenCalled();
    expect(session.food.position).toEqual({ x: 5, y: 6 });
    expect(session.getSnapshot().body).toEqual([{ x: 16, y: 12 }]);
  });

  it("reports eaten food through the session events", () => {
    const onFoodEaten = vi.fn();
    const session = new GameSession({ onFoodEaten }, { bounds, random: seededRandom(3) });
    session.food.place({ x: 16, y: 11 });
    session.tick([{ kind: "direction", direction: "up" }]);
    expect(onFoodEaten).toHaveBeenCalledWith({ x: 16, y: 11 }, 2);
  });

  it("produces detached snapshots", () => {
    const session = new GameSession({}, { bounds, random: seededRandom(8) });
    session.food.place({ x: 1, y: 1 });
    const snapshot = session.getSnapshot();
    session.tick([]);
    expect(snapshot.body).toEqual([{ x: 16, y: 12 }]);
    expect(snapshot.food).toEqual({ x: 1, y: 1 });
    expect(snapshot.tick).toBe(0);
    expect(session.getSnapshot().tick).toBe(1);
  });

  it("runs a long simulation with growth bounded by the target", () => {
    const random = seededRandom(77);
    const session = new GameSession({}, { bounds: { width: 10, height: 8 }, random });
    const turns = ["up", "left", "down", "right"] as const;
    for (let i = 0; i < 5000; i += 1) {
      const direction = turns[Math.floor(random() * turns.length)] ?? "up";
      session.tick(i % 3 === 0 ? [{ kind: "direction", direction }] : []);
      const snapshot = session.getSnapshot();
      expect(snapshot.length).toBeLessThanOrEqual(snapshot.growthTarget);
      expect(snapshot.length).toBeGreaterThan(0);
    }
    expect(session.ticks).toBe(5000);
  });
});
