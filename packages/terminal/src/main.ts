import { stdin as input, stdout as output } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";
import type { Ask } from "./prompt/ask.js";
import { Colour } from "./types/colour/colour.js";
import { TerminalConfig } from "./types/terminal-config/terminal-config.js";
import { installCachesPolyfill } from "@dropline/engine/install-caches-polyfill";

// The ecs reads globalThis.caches as it loads, so the game loads after the install.
installCachesPolyfill();
const { playGame } = await import("./play-game.js");

const createAsk = (readline: Interface): Ask => {
  const closed = new AbortController();
  readline.once("close", () => closed.abort());

  return async (query) => {
    if (closed.signal.aborted) {
      return null;
    }
    try {
      return await readline.question(query, { signal: closed.signal });
    } catch (error: unknown) {
      if (closed.signal.aborted) {
        return null;
      }
      throw error;
    }
  };
};

const readline = createInterface({ input, output });

try {
  const end = await playGame({
    ask: createAsk(readline),
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    config: TerminalConfig.readTerminalConfig(process.env),
    palette: Colour.loadPalette()
  });
  if (end === "configuration_error") {
    process.exitCode = 1;
  }
} catch (error: unknown) {
  console.error("Dropline stopped unexpectedly", error);
  process.exitCode = 1;
} finally {
  readline.close();
}
