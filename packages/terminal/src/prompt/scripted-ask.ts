import type { Ask } from "./ask.js";

/** Answers prompts from a fixed list, then behaves like closed input. */
export const createScriptedAsk = (answers: readonly string[]): { readonly ask: Ask; readonly asked: string[] } => {
  const asked: string[] = [];
  let next = 0;
  const ask: Ask = async (query) => {
    asked.push(query);
    const answer = next < answers.length ? answers[next] : null;
    next += 1;
    return answer;
  };
  return { ask, asked };
};
