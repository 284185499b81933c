/**
 * Turns the 1-based column a player typed into the engine's 0-based index.
 * Out-of-range numbers are passed through for the engine to reject.
 */
export const parseColumn = (input: string): number | null => {
  const trimmed = input.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) - 1 : null;
};
