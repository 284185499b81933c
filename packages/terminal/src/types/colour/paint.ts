import type { Colour } from "./colour.js";

export const paint = ({ rgb: [red, green, blue] }: Colour, text: string): string =>
  `\u001b[38;2;${red};${green};${blue}m${text}\u001b[39m`;
