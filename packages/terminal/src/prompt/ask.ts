/** Prompts for one line of input; resolves to null once input has closed. */
export type Ask = (query: string) => Promise<string | null>;

export type Print = (line: string) => void;
