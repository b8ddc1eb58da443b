import { Chalk, type ChalkInstance } from "chalk";
import { CELL_GLYPHS, PALETTE } from "../config/game-config";
import type { DrawLayer, Palette, RgbColor, SessionSnapshot } from "../types";
import { formatHud } from "../ui/hud";

const HIDE_CURSOR = "\u001b[?25l";
const SHOW_CURSOR = "\u001b[?25h";
const CLEAR_SCREEN = "\u001b[2J";
const CURSOR_HOME = "\u001b[H";

export interface RenderSink {
  draw: (snapshot: SessionSnapshot) => void;
}

export interface FrameWriter {
  write: (chunk: string) => unknown;
}

export interface RendererOptions {
  palette?: Palette;
  chalk?: ChalkInstance;
  showHud?: boolean;
}

function paint(chalk: ChalkInstance, glyph: string, color: RgbColor, background: RgbColor): string {
  return chalk.bgRgb(...background).rgb(...color)(glyph);
}

export function composeFrame(
  snapshot: SessionSnapshot,
  palette: Palette,
  chalk: ChalkInstance,
  showHud = true
): string[] {
  const { width, height } = snapshot.bounds;
  const grid: (DrawLayer | null)[][] = Array.from({ length: height }, () =>
    Array.from({ length: width }, () => null)
  );
  for (const layer of snapshot.layers) {
    for (const cell of layer.cells) {
      const row = grid[cell.y];
      if (row && cell.x >= 0 && cell.x < width) {
        row[cell.x] = layer;
      }
    }
  }

  const border = (text: string): string => chalk.rgb(...palette.border)(text);
  const lines = [border(`┌${"─".repeat(width * 2)}┐`)];
  for (const row of grid) {
    const cells = row
      .map((layer) =>
        layer
          ? paint(chalk, CELL_GLYPHS[layer.kind], layer.color, palette.background)
          : paint(chalk, CELL_GLYPHS.empty, palette.background, palette.background)
      )
      .join("");
    lines.push(`${border("│")}${cells}${border("│")}`);
  }
  lines.push(border(`└${"─".repeat(width * 2)}┘`));

  if (showHud) {
    lines.push(formatHud({ length: snapshot.length, boardColumns: width * 2 + 2 }));
  }
  return lines;
}

export class TerminalRenderer implements RenderSink {
  private readonly out: FrameWriter;
  private readonly palette: Palette;
  private readonly chalk: ChalkInstance;
  private readonly showHud: boolean;
  private lastFrame = "";
  private initialized = false;

  constructor(out: FrameWriter = process.stdout, options: RendererOptions = {}) {
    this.out = out;
    this.palette = options.palette ?? PALETTE;
    this.chalk = options.chalk ?? new Chalk();
    this.showHud = options.showHud ?? true;
  }

  setTitle(title: string): void {
    this.out.write(`\u001b]0;${title}\u0007`);
  }

  draw(snapshot: SessionSnapshot): void {
    const frame = composeFrame(snapshot, this.palette, this.chalk, this.showHud).join("\n");
    if (frame === this.lastFrame) {
      return;
    }
    if (!this.initialized) {
      this.out.write(`${HIDE_CURSOR}${CLEAR_SCREEN}`);
      this.initialized = true;
    }
    this.out.write(`${CURSOR_HOME}${frame}\n`);
    this.lastFrame = frame;
  }

  dispose(): void {
    if (!this.initialized) {
      return;
    }
    this.out.write(`${SHOW_CURSOR}${CLEAR_SCREEN}${CURSOR_HOME}`);
    this.initialized = false;
    this.lastFrame = "";
  }
}
