import words from "../data/stop-words.json";

export const STOP_WORDS: ReadonlySet<string> = new Set(words);
