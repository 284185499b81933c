import type { BoardSettings } from "@dropline/engine";

export type TerminalConfig = Required<BoardSettings>;
export * as TerminalConfig from "./public.js";
