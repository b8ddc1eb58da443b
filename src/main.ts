import { Chalk } from "chalk";
import { GameLoop } from "./core/game-loop";
import { GameStateMachine } from "./core/state";
import { GameSession } from "./game/game-session";
import { initI18n, t } from "./i18n";
import { InputManager } from "./input/input-manager";
import { TerminalRenderer } from "./render/terminal-renderer";
import { loadSettings } from "./storage/settings";

async function bootstrap(): Promise<void> {
  const settings = loadSettings();
  await initI18n(settings.language);

  const session = new GameSession(
    {},
    {
      bounds: { width: settings.boardWidth, height: settings.boardHeight }
    }
  );
  const input = new InputManager(process.stdin);
  const renderer = new TerminalRenderer(process.stdout, {
    chalk: settings.colors ? new Chalk() : new Chalk({ level: 0 })
  });
  const stateMachine = new GameStateMachine();

  const requestQuit = (): void => input.requestQuit();
  process.on("SIGINT", requestQuit);
  process.on("SIGTERM", requestQuit);

  stateMachine.onChange((next) => {
    if (next !== "stopped") {
      return;
    }
    process.off("SIGINT", requestQuit);
    process.off("SIGTERM", requestQuit);
    renderer.dispose();
    input.dispose();
  });

  const loop = new GameLoop(
    {
      update: () => (session.tick(input.drain()).quit ? "stop" : "continue"),
      render: () => renderer.draw(session.getSnapshot())
    },
    settings.tickRate
  );

  renderer.setTitle(t("title"));
  stateMachine.set("playing");
  try {
    await loop.start();
  } finally {
    stateMachine.set("stopped");
  }
  process.stdout.write(`${t("farewell", { value: session.snake.length })}\n`);
}

bootstrap().catch((error: unknown) => {
  console.error("[toroid-snake] Unexpected failure", error);
  process.exitCode = 1;
});
