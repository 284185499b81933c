export * from "./is-terminal.js";
