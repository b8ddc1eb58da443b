import { emitKeypressEvents, type Key } from "node:readline";
import type { Direction, InputEvent } from "../types";

export interface KeypressStream extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

const KEY_DIRECTIONS: Readonly<Record<string, Direction>> = {
  up: "up",
  w: "up",
  k: "up",
  down: "down",
  s: "down",
  j: "down",
  left: "left",
  a: "left",
  h: "left",
  right: "right",
  d: "right",
  l: "right"
};

export function translateKey(key: Key | undefined): InputEvent | null {
  if (!key?.name) {
    return null;
  }
  if ((key.ctrl && key.name === "c") || key.name === "q" || key.name === "escape") {
    return { kind: "quit" };
  }
  if (key.ctrl || key.meta) {
    return null;
  }
  const direction = KEY_DIRECTIONS[key.name];
  return direction ? { kind: "direction", direction } : null;
}

export class InputManager {
  private readonly source: KeypressStream;
  private queue: InputEvent[] = [];
  private attached = false;

  constructor(source: KeypressStream = process.stdin) {
    this.source = source;
    this.bindEvents();
  }

  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  requestQuit(): void {
    this.queue.push({ kind: "quit" });
  }

  dispose(): void {
    if (!this.attached) {
      return;
    }
    this.attached = false;
    this.source.removeListener("keypress", this.onKeypress);
    if (this.source.isTTY) {
      this.source.setRawMode?.(false);
    }
    this.source.pause();
  }

  private bindEvents(): void {
    emitKeypressEvents(this.source);
    if (this.source.isTTY) {
      this.source.setRawMode?.(true);
    }
    this.source.on("keypress", this.onKeypress);
    this.source.resume();
    this.attached = true;
  }

  private onKeypress = (_text: string | undefined, key: Key | undefined): void => {
    const event = translateKey(key);
    if (event) {
      this.queue.push(event);
    }
  };
}
