import { readFileSync } from "node:fs";
import type { Colour } from "./colour.js";

const paletteUrl = new URL("../../data/colours.json", import.meta.url);

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isChannel = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;

const toColour = (value: unknown): Colour | null => {
  if (!isObjectRecord(value)) {
    return null;
  }
  const { name, rgb } = value;
  if (typeof name !== "string" || !Array.isArray(rgb) || rgb.length !== 3) {
    return null;
  }
  const [red, green, blue]: unknown[] = rgb;
  if (!isChannel(red) || !isChannel(green) || !isChannel(blue)) {
    return null;
  }
  return { name, rgb: [red, green, blue] };
};

export const parsePalette = (input: unknown): readonly Colour[] => {
  if (!Array.isArray(input)) {
    throw new Error("Colour palette must be an array");
  }
  return input.map((entry, index) => {
    const colour = toColour(entry);
    if (colour === null) {
      throw new Error(`Colour palette entry ${index} must have a name and three 0-255 rgb channels`);
    }
    return colour;
  });
};

export const loadPalette = (): readonly Colour[] => parsePalette(JSON.parse(readFileSync(paletteUrl, "utf8")));
