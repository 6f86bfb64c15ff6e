import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppConfig } from "../../config/types";
import type { ConversationRecorder } from "../../conversations/recorder";
import type { ChatProvider } from "../../llm/types";
import { answerQuestion } from "../../query/answerQuestion";
import type { RetrievalEngine } from "../../query/retrieval";
import { extractHeader } from "../middleware/apiKey";
import { abortOnClientClose, toHttpFailure } from "../utils/errors";

export const DEFAULT_MODEL_NAME = "corpus-chat";

export interface ChatCompletionsContext {
    config: AppConfig;
    chat: ChatProvider;
    retrieval: RetrievalEngine;
    recorder: ConversationRecorder;
}

const messageSchema = z.object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.string(),
});

const chatCompletionsSchema = z.object({
    model: z.string().optional(),
    messages: z.array(messageSchema).min(1),
    stream: z.boolean().optional(),
    user: z.string().min(1).optional(),
    // Custom parameter for retrieval
    matchCount: z.number().int().positive().optional(),
});

function invalidRequest(res: Response, message: string, param: string | null): void {
    res.status(400).json({
        error: {
            message,
            type: "invalid_request_error",
            param,
            code: null,
        },
    });
}

function createOpenAIResponse(content: string, model: string) {
    return {
        id: `chatcmpl-${Date.now()}`,
        object: "chat.completion",
        created: Math.floor(Date.now() / 1000),
        model,
        choices: [
            {
                index: 0,
                message: {
                    role: "assistant",
                    content,
                },
                finish_reason: "stop",
            },
        ],
        usage: {
            prompt_tokens: 0,
            completion_tokens: 0,
            total_tokens: 0,
        },
    };
}

export async function handleChatCompletions(
    req: Request,
    res: Response,
    context: ChatCompletionsContext,
    logger: Logger
): Promise<void> {
    const parsed = chatCompletionsSchema.safeParse(req.body);
    if (!parsed.success) {
        invalidRequest(res, "Request body must include a non-empty 'messages' array.", "messages");
        return;
    }

    const body = parsed.data;
    if (body.stream) {
        invalidRequest(res, "Streaming responses are not supported.", "stream");
        return;
    }

    // Find the last user message as the question
    const userMessages = body.messages.filter((message) => message.role === "user");
    const question = userMessages[userMessages.length - 1]?.content ?? "";

    if (!question.trim()) {
        invalidRequest(res, "No user message found in messages array.", "messages");
        return;
    }

    const signal = abortOnClientClose(res);

    try {
        const result = await answerQuestion(
            {
                retrieval: context.retrieval,
                chat: context.chat,
                recorder: context.recorder,
                prompt: context.config.prompt,
                conversations: context.config.conversations,
                logger,
            },
            {
                question,
                conversationId: body.user ?? "default",
                idempotencyKey: extractHeader(req, "idempotency-key"),
                matchCount: body.matchCount,
                signal,
            }
        );

        res.json(createOpenAIResponse(result.answer, body.model ?? DEFAULT_MODEL_NAME));
    } catch (error) {
        const failure = toHttpFailure(error);
        if (failure.status >= 500) {
            logger.error({ err: error }, "Chat completions endpoint failed.");
        }
        if (!res.headersSent && !res.writableEnded) {
            res.status(failure.status).json({
                error: {
                    message: failure.message,
                    type: failure.type,
                    param: null,
                    code: null,
                },
            });
        }
    }
}
