import type { Cell } from "../types";
import { cellsEqual } from "../world/grid";

export function checkSelfCollision(nextHead: Cell, body: readonly Cell[], skipSegments = 2): boolean {
  for (let i = skipSegments; i < body.length; i += 1) {
    if (cellsEqual(nextHead, body[i])) {
      return true;
    }
  }
  return false;
}

export function checkFoodCollision(head: Cell, food: Cell): boolean {
  return cellsEqual(head, food);
}
