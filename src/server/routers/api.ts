import { Router } from "express";
import type { Logger } from "pino";
import { handleChatRequest } from "../routes/chat";
import { handleChatCompletions } from "../routes/chatCompletions";
import { handleRefreshRequest } from "../routes/refresh";
import type { RouterContext } from "../utils/context";

export function createApiRouter(context: RouterContext, logger: Logger): Router {
    const router = Router();

    router.post("/chat", async (req, res) => {
        await handleChatRequest(req, res, {
            config: context.config,
            chat: context.llm.chat,
            retrieval: context.retrieval,
            recorder: context.recorder,
        }, logger);
    });

    router.post("/v1/chat/completions", async (req, res) => {
        await handleChatCompletions(req, res, {
            config: context.config,
            chat: context.llm.chat,
            retrieval: context.retrieval,
            recorder: context.recorder,
        }, logger);
    });

    router.post("/admin/refresh", async (req, res) => {
        await handleRefreshRequest(req, res, {
            refresh: context.refresh,
            isRefreshBusy: context.isRefreshBusy,
            setRefreshBusy: context.setRefreshBusy,
        }, logger);
    });

    return router;
}
