import { config as loadDotenv } from "dotenv";
import path from "node:path";
import type {
    AppConfig,
    ConversationStoreKind,
    LLMProviderName,
    LoggingConfig,
    RefreshPolicy,
} from "./types";

const REFRESH_POLICIES: readonly RefreshPolicy[] = ["always-refresh", "fetch-if-missing", "fetch-and-swap"];
const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const LLM_PROVIDERS: readonly LLMProviderName[] = ["openai", "anthropic"];
const EMBEDDING_PROVIDERS: readonly LLMProviderName[] = ["openai"];
const STORE_KINDS: readonly ConversationStoreKind[] = ["supabase", "memory"];

function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key]?.trim();
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue?: T): T {
    const raw = process.env[key]?.trim();
    if (!raw) {
        if (defaultValue === undefined) {
            throw new Error(`Missing required environment variable: ${key}`);
        }
        return defaultValue;
    }
    const normalized = raw.toLowerCase();
    const match = choices.find((choice) => choice === normalized);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${raw}`);
    }
    return match;
}

/**
 * Accepts both `fetch-if-missing` and `FETCH_IF_MISSING` spellings.
 */
export function parseRefreshPolicy(raw: string): RefreshPolicy {
    const normalized = raw.trim().toLowerCase().replace(/_/g, "-");
    const match = REFRESH_POLICIES.find((policy) => policy === normalized);
    if (!match) {
        throw new Error(`Unknown refresh policy "${raw}". Expected one of ${REFRESH_POLICIES.join(", ")}.`);
    }
    return match;
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.CORPUS_CHAT_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.CORPUS_CHAT_CONFIG_PATH);
    }

    return path.join(process.cwd(), ".env");
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    const policyRaw = getEnv("SNAPSHOT_REFRESH_POLICY", false);
    if (!policyRaw) {
        throw new Error(
            `SNAPSHOT_REFRESH_POLICY must be set explicitly to one of ${REFRESH_POLICIES.join(", ")}.`
        );
    }

    const conversationStore = getEnvChoice("CONVERSATION_STORE", STORE_KINDS, "supabase");

    const supabaseUrl = getEnv("SUPABASE_URL", false);
    const supabaseServiceRoleKey = getEnv("SUPABASE_SERVICE_ROLE_KEY", false) ?? getEnv("SUPABASE_KEY", false);

    if (conversationStore === "supabase" && (!supabaseUrl || !supabaseServiceRoleKey)) {
        throw new Error("Supabase conversation store requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.");
    }

    const chatProvider = getEnvChoice("LLM_CHAT_PROVIDER", LLM_PROVIDERS);
    const chatModel = getEnv("LLM_CHAT_MODEL");
    const embeddingProvider = getEnvChoice("LLM_EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS, "openai");
    const embeddingModel = getEnv("LLM_EMBEDDING_MODEL");

    if (!chatModel || !embeddingModel) {
        throw new Error("LLM configuration requires LLM_CHAT_MODEL and LLM_EMBEDDING_MODEL.");
    }

    const installPath = path.resolve(process.cwd(), getEnv("SNAPSHOT_INSTALL_PATH", false) ?? "./data/knowledge");
    const scratchDir = getEnv("SNAPSHOT_SCRATCH_DIR", false);

    const config: AppConfig = {
        logging: {
            level: getEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean("LOG_PRETTY", false),
        },
        server: {
            apiKey: getEnv("SERVER_API_KEY", false),
            port: getEnvNumber("PORT", 8000),
        },
        snapshot: {
            sourceUrl: getEnv("SNAPSHOT_URL", false),
            token: getEnv("SNAPSHOT_TOKEN", false) ?? getEnv("GITHUB_TOKEN", false),
            policy: parseRefreshPolicy(policyRaw),
            installPath,
            markerFile: getEnv("SNAPSHOT_MARKER_FILE", false) ?? "index.json",
            scratchDir: scratchDir ? path.resolve(process.cwd(), scratchDir) : undefined,
            fetchTimeoutMs: getEnvNumber("SNAPSHOT_FETCH_TIMEOUT_MS", 120_000),
            fetchRetries: getEnvNumber("SNAPSHOT_FETCH_RETRIES", 3),
            retryMinTimeoutMs: getEnvNumber("SNAPSHOT_RETRY_MIN_TIMEOUT_MS", 1_000),
        },
        retrieval: {
            matchCount: getEnvNumber("RETRIEVAL_MATCH_COUNT", 10),
            similarityThreshold: getEnvNumber("RETRIEVAL_SIMILARITY_THRESHOLD", 0.2),
        },
        prompt: {
            systemPrompt: getEnv("PROMPT_SYSTEM", false),
            maxContextChars: getEnvNumber("PROMPT_MAX_CONTEXT_CHARS", 12_000),
            historyTurns: getEnvNumber("PROMPT_HISTORY_TURNS", 5),
        },
        conversations: {
            store: conversationStore,
            table: getEnv("CONVERSATION_TABLE", false) ?? "conversation_turns",
            interfaceSource: getEnv("CONVERSATION_INTERFACE_SOURCE", false) ?? "api",
            recordPartialTurns: getEnvBoolean("CONVERSATION_RECORD_PARTIAL", false),
        },
        supabase:
            supabaseUrl && supabaseServiceRoleKey
                ? { url: supabaseUrl, serviceRoleKey: supabaseServiceRoleKey }
                : undefined,
        llm: {
            embedding: {
                provider: embeddingProvider,
                model: embeddingModel,
                apiKey: getEnv("LLM_EMBEDDING_API_KEY", false) ?? getEnv("OPENAI_API_KEY", false),
                baseUrl: getEnv("LLM_EMBEDDING_BASE_URL", false),
                limits: {
                    concurrency: getEnvNumber("LLM_EMBEDDING_LIMITS_CONCURRENCY", 8),
                    maxRequestsPerMinute: getEnvNumber("LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE", 1500),
                    maxTokensPerMinute: getEnvNumber("LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE", 6250000),
                    retries: getEnvNumber("LLM_EMBEDDING_LIMITS_RETRIES", 1),
                },
            },
            chat: {
                provider: chatProvider,
                model: chatModel,
                apiKey:
                    getEnv("LLM_CHAT_API_KEY", false) ??
                    (chatProvider === "anthropic" ? getEnv("ANTHROPIC_API_KEY", false) : getEnv("OPENAI_API_KEY", false)),
                baseUrl: getEnv("LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber("LLM_CHAT_TEMPERATURE", 0),
                maxOutputTokens: getEnvNumber("LLM_CHAT_MAX_OUTPUT_TOKENS", 2048),
                limits: {
                    concurrency: getEnvNumber("LLM_CHAT_LIMITS_CONCURRENCY", 8),
                    maxRequestsPerMinute: getEnvNumber("LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE", 500),
                    maxTokensPerMinute: getEnvNumber("LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE", 90000),
                    // the pipeline treats provider failures as final for the request
                    retries: getEnvNumber("LLM_CHAT_LIMITS_RETRIES", 0),
                },
            },
        },
    };

    return config;
}
