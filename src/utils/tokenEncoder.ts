import { get_encoding, encoding_for_model, type Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

// tiktoken refuses to encode text containing these literally
const SPECIAL_TOKENS = [
    "<|endoftext|>",
    "<|endofprompt|>",
    "<|fim_prefix|>",
    "<|fim_middle|>",
    "<|fim_suffix|>",
] as const;

function sanitizeSpecialTokens(text: string): string {
    let sanitized = text;
    for (const token of SPECIAL_TOKENS) {
        sanitized = sanitized.split(token).join(token.replace(/\|/g, "&#124;"));
    }
    return sanitized;
}

function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

/**
 * Token estimate used to reserve rate-limit budget. Falls back to ~4 characters
 * per token when the tokenizer cannot encode the text.
 */
export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        return getEncoder(model).encode(sanitizeSpecialTokens(text)).length;
    } catch {
        return Math.ceil(text.length / 4);
    }
}
