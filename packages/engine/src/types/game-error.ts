export interface GameError {
  readonly code: "invalid_configuration";
  readonly message: string;
  readonly details?: unknown;
}
