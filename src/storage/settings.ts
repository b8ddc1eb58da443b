import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { BOARD_BOUNDS, GAME_CONFIG, SETTINGS_LIMITS } from "../config/game-config";
import type { SettingsState } from "../types";

const SETTINGS_VERSION = 1;
const SETTINGS_FILE = ".toroid-snake.json";
export const SETTINGS_PATH_ENV = "TOROID_SNAKE_SETTINGS";

const boardSide = z.number().int().min(SETTINGS_LIMITS.minBoardSide).max(SETTINGS_LIMITS.maxBoardSide);

const SettingsDataSchema = z.object({
  language: z.enum(["en", "ru"]),
  tickRate: z.number().min(SETTINGS_LIMITS.minTickRate).max(SETTINGS_LIMITS.maxTickRate),
  boardWidth: boardSide,
  boardHeight: boardSide,
  colors: z.boolean()
});

const SettingsEnvelopeSchema = z.object({
  version: z.number(),
  data: SettingsDataSchema
});

type SettingsEnvelope = z.infer<typeof SettingsEnvelopeSchema>;
type ParsedSettingsData = z.infer<typeof SettingsDataSchema>;

export const defaultSettings: SettingsState = {
  language: "en",
  tickRate: GAME_CONFIG.tickRate,
  boardWidth: BOARD_BOUNDS.width,
  boardHeight: BOARD_BOUNDS.height,
  colors: true
};

export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[SETTINGS_PATH_ENV] || join(homedir(), SETTINGS_FILE);
}

export function loadSettings(path = resolveSettingsPath()): SettingsState {
  if (!existsSync(path)) {
    return { ...defaultSettings };
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    const normalized = migrateSettings(parsed);
    const result = SettingsEnvelopeSchema.safeParse(normalized);
    if (!result.success) {
      console.warn(`[toroid-snake] Ignoring invalid settings in ${path}`, result.error.issues);
      return { ...defaultSettings };
    }
    const envelope: SettingsEnvelope = result.data;
    return normalizeSettings(envelope.data);
  } catch (error) {
    console.warn(`[toroid-snake] Failed to read settings from ${path}, using defaults`, error);
    return { ...defaultSettings };
  }
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

export function migrateSettings(input: unknown): unknown {
  if (!isRecord(input)) {
    return {
      version: SETTINGS_VERSION,
      data: defaultSettings
    };
  }

  if (typeof input.version !== "number") {
    return {
      version: SETTINGS_VERSION,
      data: {
        ...defaultSettings,
        ...input
      }
    };
  }

  if (input.version === SETTINGS_VERSION) {
    return input;
  }

  return {
    version: SETTINGS_VERSION,
    data: defaultSettings
  };
}

function normalizeSettings(data: ParsedSettingsData): SettingsState {
  return {
    language: data.language,
    tickRate: data.tickRate,
    boardWidth: data.boardWidth,
    boardHeight: data.boardHeight,
    colors: data.colors
  };
}
