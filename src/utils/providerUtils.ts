import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

/** Configured limits win over provider defaults, except where left unset. */
export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    return {
        concurrency: override.concurrency ?? defaults.concurrency,
        maxRequestsPerMinute: override.maxRequestsPerMinute ?? defaults.maxRequestsPerMinute,
        maxTokensPerMinute: override.maxTokensPerMinute ?? defaults.maxTokensPerMinute,
        retries: override.retries ?? defaults.retries,
    };
}
