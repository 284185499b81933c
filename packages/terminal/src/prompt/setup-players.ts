import type { Player } from "@dropline/engine";
import { Colour } from "../types/colour/colour.js";
import type { Ask } from "./ask.js";

const listColours = (colours: readonly Colour[]): string => colours.map((colour) => colour.name).join(", ");

const askPlayer = async (
  ask: Ask,
  id: number,
  available: readonly Colour[]
): Promise<{ readonly player: Player; readonly remaining: readonly Colour[] } | null> => {
  let name = await ask(`Player ${id} - Please type your name: `);
  while (name !== null && name.trim() === "") {
    name = await ask(`Player ${id} - Please type a name that is not blank: `);
  }
  if (name === null) return null;

  let choice = await ask(`Choose a colour from \n${listColours(available)}: `);
  while (choice !== null) {
    const taken = Colour.takeColour(available, choice);
    if (taken.ok) {
      return { player: { name: name.trim(), colour: taken.colour.name }, remaining: taken.remaining };
    }
    choice = await ask(`Please choose a valid colour from \n${listColours(available)}: `);
  }
  return null;
};

/** Asks both players for a name and a colour nobody has taken yet. Null when input closes first. */
export const setupPlayers = async (
  ask: Ask,
  palette: readonly Colour[]
): Promise<readonly [Player, Player] | null> => {
  const first = await askPlayer(ask, 1, palette);
  if (first === null) return null;
  const second = await askPlayer(ask, 2, first.remaining);
  if (second === null) return null;
  return [first.player, second.player];
};
