import type { Colour } from "./colour.js";

export type TakeColourResult =
  | { readonly ok: true; readonly colour: Colour; readonly remaining: readonly Colour[] }
  | { readonly ok: false };

/** Picks `choice` out of `available` so the other player cannot take it too. */
export const takeColour = (available: readonly Colour[], choice: string): TakeColourResult => {
  const name = choice.trim().toLowerCase();
  const colour = available.find((candidate) => candidate.name === name);
  if (colour === undefined) {
    return { ok: false };
  }
  return { ok: true, colour, remaining: available.filter((candidate) => candidate !== colour) };
};
