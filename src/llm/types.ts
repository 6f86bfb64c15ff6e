import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface CompletionRequest {
    system: string;
    prompt: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface CompletionUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface CompletionResult {
    text: string;
    usage?: CompletionUsage;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
