import adjectives from "../data/adjectives.json" with { type: "json" };
import nouns from "../data/nouns.json" with { type: "json" };

/** Built-in English adjectives */
export const ADJECTIVES: readonly string[] = Object.freeze(adjectives);

/** Built-in English nouns */
export const NOUNS: readonly string[] = Object.freeze(nouns);
