export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
    pretty: boolean;
}

export interface ServerConfig {
    /** When unset the API routes are served without authentication. */
    apiKey?: string;
    port: number;
}

export type RefreshPolicy = "always-refresh" | "fetch-if-missing" | "fetch-and-swap";

export interface SnapshotConfig {
    sourceUrl?: string;
    token?: string;
    policy: RefreshPolicy;
    installPath: string;
    markerFile: string;
    scratchDir?: string;
    fetchTimeoutMs: number;
    fetchRetries: number;
    retryMinTimeoutMs: number;
}

export interface RetrievalConfig {
    matchCount: number;
    similarityThreshold: number;
}

export interface PromptConfig {
    systemPrompt?: string;
    maxContextChars: number;
    historyTurns: number;
}

export type ConversationStoreKind = "supabase" | "memory";

export interface ConversationConfig {
    store: ConversationStoreKind;
    table: string;
    interfaceSource: string;
    recordPartialTurns: boolean;
}

export interface SupabaseConfig {
    url: string;
    serviceRoleKey: string;
}

export type LLMProviderName = "openai" | "anthropic";

export interface ProviderLimitsConfig {
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    snapshot: SnapshotConfig;
    retrieval: RetrievalConfig;
    prompt: PromptConfig;
    conversations: ConversationConfig;
    supabase?: SupabaseConfig;
    llm: LLMConfig;
}
