import crypto from "node:crypto";
import type { Logger } from "pino";
import type { ConversationConfig, PromptConfig } from "../config/types";
import type { ConversationRecorder } from "../conversations/recorder";
import type { HistoryTurn, TurnStatus } from "../conversations/types";
import { InvalidRequestError, PersistenceError, ProviderError, describeError } from "../errors";
import type { ChatProvider } from "../llm/types";
import { getLogger } from "../utils/logger";
import { type PromptContext, assemblePrompt, renderPromptContext } from "./assemblePrompt";
import type { RetrievalEngine, RetrievalResult } from "./retrieval";

export interface AnswerDependencies {
    retrieval: RetrievalEngine;
    chat: ChatProvider;
    recorder: ConversationRecorder;
    prompt: PromptConfig;
    conversations: ConversationConfig;
    logger?: Logger;
    now?: () => Date;
}

export interface AnswerRequest {
    question: string;
    conversationId: string;
    idempotencyKey?: string;
    matchCount?: number;
    signal?: AbortSignal;
}

export interface AnswerResult {
    answer: string;
    /** Full text sent to the model (system and prompt). */
    context: string;
    contextRef: string;
    /** Fragments retrieved for this question. */
    documentCount: number;
    /** Documents in the active snapshot. */
    totalDocuments: number;
    generation: string;
    conversationId: string;
    idempotencyKey: string;
    sequence: number | null;
    persisted: boolean;
}

export class RequestAbortedError extends Error {
    constructor(public readonly partialSequence: number | null) {
        super("Request was aborted before the answer completed.");
        this.name = "RequestAbortedError";
    }
}

async function loadHistory(deps: AnswerDependencies, conversationId: string, logger: Logger): Promise<HistoryTurn[]> {
    try {
        return await deps.recorder.history(conversationId, deps.prompt.historyTurns);
    } catch (error) {
        logger.warn({ err: error, conversationId }, "Conversation history unavailable; answering without it.");
        return [];
    }
}

async function recordTurn(
    deps: AnswerDependencies,
    request: AnswerRequest & { idempotencyKey: string },
    answer: string,
    status: TurnStatus,
    contextRef: string | undefined,
    now: Date,
    logger: Logger
): Promise<number | null> {
    try {
        const { sequence } = await deps.recorder.record(
            request.conversationId,
            {
                idempotencyKey: request.idempotencyKey,
                userMessage: request.question,
                assistantResponse: answer,
                status,
                contextRef,
                interfaceSource: deps.conversations.interfaceSource,
            },
            now
        );
        return sequence;
    } catch (error) {
        if (!(error instanceof PersistenceError)) {
            throw error;
        }
        logger.error({ err: error, conversationId: request.conversationId }, "Failed to record conversation turn.");
        return null;
    }
}

async function complete(chat: ChatProvider, context: PromptContext, signal?: AbortSignal): Promise<string> {
    try {
        const completion = await chat.complete({ system: context.system, prompt: context.prompt, signal });
        return completion.text;
    } catch (error) {
        if (error instanceof ProviderError) {
            throw error;
        }
        throw new ProviderError(`Completion failed: ${describeError(error)}`, { cause: error });
    }
}

/**
 * Answers one question against the active snapshot: history, retrieval, prompt
 * assembly, completion and turn recording. A recording failure does not fail the
 * request; the result reports `persisted: false` instead.
 */
export async function answerQuestion(deps: AnswerDependencies, request: AnswerRequest): Promise<AnswerResult> {
    const logger = deps.logger ?? getLogger();
    const question = request.question.trim();
    if (!question) {
        throw new InvalidRequestError("Question cannot be empty.");
    }

    const now = (deps.now ?? (() => new Date()))();
    const idempotencyKey = request.idempotencyKey ?? crypto.randomUUID();
    const normalized = { ...request, question, idempotencyKey };

    const history = await loadHistory(deps, request.conversationId, logger);

    // an abort anywhere below surfaces as RequestAbortedError
    let promptContext: PromptContext | undefined;
    let generated: { retrieval: RetrievalResult; context: PromptContext; answer: string };
    try {
        const retrieval = await deps.retrieval.retrieve(question, request.matchCount, { signal: request.signal });

        const context = assemblePrompt(
            {
                query: question,
                fragments: retrieval.fragments,
                corpus: retrieval.corpus,
                history,
                currentDate: now,
            },
            {
                systemPrompt: deps.prompt.systemPrompt,
                maxContextChars: deps.prompt.maxContextChars,
            }
        );
        promptContext = context;

        logger.info(
            {
                conversationId: request.conversationId,
                generation: retrieval.generation,
                fragments: context.fragmentIds.length,
                historyTurns: context.historyTurns,
            },
            "Generating answer with retrieved context."
        );

        generated = { retrieval, context, answer: await complete(deps.chat, context, request.signal) };
    } catch (error) {
        if (!request.signal?.aborted) {
            throw error;
        }
        let partialSequence: number | null = null;
        if (deps.conversations.recordPartialTurns) {
            partialSequence = await recordTurn(deps, normalized, "", "partial", promptContext?.contextRef, now, logger);
        }
        logger.info({ conversationId: request.conversationId, partialSequence }, "Request aborted by caller.");
        throw new RequestAbortedError(partialSequence);
    }

    const { retrieval, context, answer } = generated;
    const sequence = await recordTurn(deps, normalized, answer, "complete", context.contextRef, now, logger);

    return {
        answer,
        context: renderPromptContext(context),
        contextRef: context.contextRef,
        documentCount: retrieval.fragments.length,
        totalDocuments: retrieval.corpus.documentCount,
        generation: retrieval.generation,
        conversationId: request.conversationId,
        idempotencyKey,
        sequence,
        persisted: sequence !== null,
    };
}
