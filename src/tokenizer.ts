import { encode } from "gpt-tokenizer";

export type TokenCounter = (text: string) => number;

// Transcripts are freeform; strings like "<|endoftext|>" count as plain text.
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

/** Token count under cl100k_base, the encoding of the extraction models. */
export const countTokens: TokenCounter = (text) => encode(text, PLAIN_TEXT).length;
