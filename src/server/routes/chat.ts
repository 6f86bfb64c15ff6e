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

export const CONTEXT_PREVIEW_CHARS = 500;

export interface ChatRouteContext {
    config: AppConfig;
    chat: ChatProvider;
    retrieval: RetrievalEngine;
    recorder: ConversationRecorder;
}

const chatRequestSchema = z.object({
    message: z.string(),
    session_id: z.string().min(1).default("default"),
    idempotency_key: z.string().min(1).optional(),
});

export async function handleChatRequest(
    req: Request,
    res: Response,
    context: ChatRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
        res.status(400).json({
            status: "error",
            message: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        });
        return;
    }

    const body = parsed.data;
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
                question: body.message,
                conversationId: body.session_id,
                idempotencyKey: extractHeader(req, "idempotency-key") || body.idempotency_key,
                signal,
            }
        );

        res.json({
            response: result.answer,
            context: result.context.slice(0, CONTEXT_PREVIEW_CHARS),
            document_count: result.documentCount,
            total_documents: result.totalDocuments,
            conversation_id: result.conversationId,
            sequence: result.sequence,
            persisted: result.persisted,
        });
    } catch (error) {
        const failure = toHttpFailure(error);
        if (failure.status >= 500) {
            logger.error({ err: error }, "Chat request failed.");
        }
        if (!res.headersSent && !res.writableEnded) {
            res.status(failure.status).json({ status: "error", message: failure.message });
        }
    }
}
