/** Any counter works as long as it is monotonic in the text it is given. */
export type TokenCounter = (text: string) => number;

/** Roughly four characters per token for English text and code. */
export const approximateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);
