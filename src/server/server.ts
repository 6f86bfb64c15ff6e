import type { Server } from "node:http";
import express from "express";
import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import { InMemoryConversationStore } from "../conversations/memoryStore";
import { ConversationRecorder } from "../conversations/recorder";
import type { ConversationStore } from "../conversations/types";
import { createLLMClient } from "../llm/factory";
import type { LLMClientBundle } from "../llm/types";
import { RetrievalEngine } from "../query/retrieval";
import { refreshSnapshot } from "../snapshot/bootstrap";
import type { SnapshotHolder } from "../snapshot/holder";
import { SupabaseConversationStore } from "../supabase/conversationStore";
import { getLogger } from "../utils/logger";
import { createApiKeyMiddleware } from "./middleware/apiKey";
import { createApiRouter } from "./routers/api";
import { handleHealthRequest } from "./routes/health";
import { type ServerContext, createRouterContext } from "./utils/context";
import { applyCors } from "./utils/cors";

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

export interface ServerContextOverrides {
    llm?: LLMClientBundle;
    store?: ConversationStore;
}

async function createConversationStore(config: AppConfig, logger: Logger): Promise<ConversationStore> {
    if (config.conversations.store === "memory") {
        logger.warn("Using the in-memory conversation store; turns are lost on restart.");
        return new InMemoryConversationStore();
    }

    if (!config.supabase) {
        throw new Error("Supabase configuration is required for the supabase conversation store.");
    }

    const store = new SupabaseConversationStore(config.supabase, config.conversations.table, logger);
    await store.verifyConnection();
    return store;
}

/**
 * Wires request-time components around an already activated snapshot holder.
 */
export async function createServerContext(
    config: AppConfig,
    holder: SnapshotHolder,
    logger: Logger = getLogger(),
    overrides: ServerContextOverrides = {}
): Promise<ServerContext> {
    const llm = overrides.llm ?? createLLMClient(config.llm, logger);
    const store = overrides.store ?? (await createConversationStore(config, logger));

    return {
        config,
        holder,
        llm,
        retrieval: new RetrievalEngine(holder, llm.embedding, config.retrieval, logger),
        recorder: new ConversationRecorder(store, { logger }),
        refresh: () => refreshSnapshot(config.snapshot, holder, { logger }),
        refreshBusy: false,
    };
}

export function createServer(context: ServerContext, logger: Logger = getLogger()): ExpressApp {
    const app = express();
    app.use(express.json({ limit: "1mb" }));
    app.use(applyCors);

    app.get("/health", (req, res) => {
        handleHealthRequest(req, res, { holder: context.holder, refreshBusy: context.refreshBusy });
    });

    // everything below /health requires the API key when one is configured
    app.use(createApiKeyMiddleware(context.config.server.apiKey));
    app.use(createApiRouter(createRouterContext(context), logger));

    return app;
}

export async function startServer(app: ExpressApp, port: number, logger: Logger = getLogger()): Promise<RunningServer> {
    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    const address = server.address();
    const boundPort = typeof address === "object" && address ? address.port : port;
    logger.info({ port: boundPort }, "Server listening.");

    return {
        app,
        port: boundPort,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            }),
    };
}
