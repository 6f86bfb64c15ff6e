import { InvalidRequestError, ProviderError, RetrievalError, describeError } from "../../errors";
import { RequestAbortedError } from "../../query/answerQuestion";

export interface HttpFailure {
    status: number;
    message: string;
    type: string;
}

export const RATE_LIMIT_MESSAGE = "Rate limit reached. Please try again in a moment.";

export function toHttpFailure(error: unknown): HttpFailure {
    if (error instanceof InvalidRequestError) {
        return { status: 400, message: error.message, type: "invalid_request_error" };
    }
    if (error instanceof ProviderError) {
        if (error.rateLimited) {
            return { status: 429, message: RATE_LIMIT_MESSAGE, type: "rate_limit_error" };
        }
        return { status: 502, message: error.message, type: "provider_error" };
    }
    if (error instanceof RequestAbortedError) {
        return { status: 499, message: error.message, type: "request_aborted" };
    }
    if (error instanceof RetrievalError) {
        return { status: 500, message: error.message, type: "retrieval_error" };
    }
    return { status: 500, message: describeError(error), type: "internal_server_error" };
}

/** Aborts the returned signal when the client goes away before the response ends. */
export function abortOnClientClose(res: { writableEnded: boolean; once(event: "close", listener: () => void): unknown }): AbortSignal {
    const controller = new AbortController();
    res.once("close", () => {
        if (!res.writableEnded) {
            controller.abort();
        }
    });
    return controller.signal;
}
