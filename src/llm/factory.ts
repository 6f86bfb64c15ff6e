import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig } from "../config/types";
import { AnthropicChatProvider } from "./providers/anthropic";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";

function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    switch (config.provider) {
        case "openai":
            return new OpenAIEmbeddingProvider(config, logger);
        default:
            throw new Error(`Embedding provider "${config.provider}" is not supported.`);
    }
}

function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    switch (config.provider) {
        case "openai":
            return new OpenAIChatProvider(config, logger);
        case "anthropic":
            return new AnthropicChatProvider(config, logger);
    }
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
}
