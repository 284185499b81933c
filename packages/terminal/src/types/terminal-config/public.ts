export * from "./read-terminal-config.js";
