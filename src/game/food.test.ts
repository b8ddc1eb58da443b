import { describe, expect, it } from "vitest";
import { seededRandom } from "../util/random";
import { Food } from "./food";

const bounds = { width: 32, height: 24 };
const red = [255, 0, 0] as const;

function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

describe("food", () => {
  it("draws its first position on construction", () => {
    const food = new Food({ bounds, color: red, random: sequence(0.5, 0.25) });
    expect(food.position).toEqual({ x: 16, y: 6 });
    expect(food.occupiedCells()).toEqual([{ x: 16, y: 6 }]);
  });

  it("draws x and y independently on relocation", () => {
    const food = new Food({ bounds, color: red, random: sequence(0, 0, 0.999, 0.999) });
    expect(food.position).toEqual({ x: 0, y: 0 });
    food.relocatePosition();
    expect(food.position).toEqual({ x: 31, y: 23 });
  });

  it("stays inside the board and reaches every column", () => {
    const food = new Food({ bounds, color: red, random: seededRandom(99) });
    const columns = new Set<number>();
    for (let i = 0; i < 3000; i += 1) {
      food.relocatePosition();
      const { x, y } = food.position;
      expect(Number.isInteger(x) && Number.isInteger(y)).toBe(true);
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(32);
      expect(y).toBeGreaterThanOrEqual(0);
      expect(y).toBeLessThan(24);
      columns.add(x);
    }
    expect(columns.size).toBe(32);
  });

  it("exposes its color for drawing", () => {
    const food = new Food({ bounds, color: red, random: () => 0 });
    expect(food.color).toEqual([255, 0, 0]);
  });
});
