import Bottleneck from "bottleneck";
import pRetry from "p-retry";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { ProviderError, describeError } from "../errors";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens } from "../utils/tokenEncoder";
import type {
    ChatProvider,
    CompletionRequest,
    CompletionResult,
    EmbedOptions,
    EmbeddingProvider,
} from "./types";

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

export interface ProviderRateLimits {
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

/**
 * Request and token budgets shared by the concrete providers. Each call reserves
 * its estimated token weight before it is scheduled on the request limiter.
 */
abstract class RateLimitedProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;
    private readonly tokenBudget?: number;

    constructor(
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.retries = limits.retries ?? 5;
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);

        this.requestLimiter = createRateLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            this.tokenBudget = Math.max(1, Math.floor(limits.maxTokensPerMinute));
            const tokenConcurrency = Math.max(this.concurrencyLimit, Math.ceil(limits.maxTokensPerMinute));
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    protected async scheduleWithRateLimits<T>(
        tokens: number,
        task: () => Promise<T>,
        { logPrefix, signal }: ScheduleOptions
    ): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(
                async () => {
                    if (signal?.aborted) {
                        throw new pRetry.AbortError(`${logPrefix} aborted by caller`);
                    }
                    try {
                        return await task();
                    } catch (error) {
                        // no further attempts once the caller is gone
                        if (signal?.aborted && error instanceof Error) {
                            throw new pRetry.AbortError(error);
                        }
                        throw error;
                    }
                },
                {
                    retries: this.retries,
                    onFailedAttempt: (error) => {
                        this.logger?.warn(
                            {
                                attemptNumber: error.attemptNumber,
                                retriesLeft: error.retriesLeft,
                                error: error.message,
                            },
                            `${logPrefix} failed attempt`
                        );
                    },
                }
            )
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || !this.tokenBudget || tokens <= 0) {
            return;
        }

        // a weight above the reservoir size would never be scheduled
        const weight = Math.min(this.tokenBudget, Math.max(1, Math.ceil(tokens)));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends RateLimitedProvider implements EmbeddingProvider {
    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const tokens = countTokens(query, this.config.model);
        let embedding: number[] | undefined;
        try {
            [embedding] = await this.scheduleWithRateLimits(tokens, () => this.sendEmbeddingRequest([query], options), {
                logPrefix: `${this.config.provider}:embed`,
                signal: options?.signal,
            });
        } catch (error) {
            if (error instanceof ProviderError) {
                throw error;
            }
            throw new ProviderError(`${this.config.provider} embedding failed: ${describeError(error)}`, {
                cause: error,
            });
        }

        if (!embedding) {
            throw new ProviderError(`${this.config.provider} returned no embedding for the query.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(values: string[], options?: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider extends RateLimitedProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
    }

    /**
     * Runs one completion. Every failure, including aborts, surfaces as a
     * `ProviderError`; callers check their own signal to tell an abort apart.
     */
    async complete(request: CompletionRequest): Promise<CompletionResult> {
        const tokens = this.estimateChatTokens(request);
        try {
            return await this.scheduleWithRateLimits(tokens, () => this.sendCompletion(request), {
                logPrefix: `${this.config.provider}:chat`,
                signal: request.signal,
            });
        } catch (error) {
            if (error instanceof ProviderError) {
                throw error;
            }
            throw new ProviderError(`${this.config.provider} completion failed: ${describeError(error)}`, {
                cause: error,
            });
        }
    }

    protected estimateChatTokens(request: CompletionRequest): number {
        const model = this.config.model;
        const tokens = countTokens(request.system, model) + countTokens(request.prompt, model);
        return tokens + (request.maxTokens ?? this.config.maxOutputTokens ?? 2000);
    }

    protected abstract sendCompletion(request: CompletionRequest): Promise<CompletionResult>;
}
