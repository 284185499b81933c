export interface Colour {
  readonly name: string;
  readonly rgb: readonly [number, number, number];
}
export * as Colour from "./public.js";
