import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import type { AppConfig } from "../config/types";
import { InMemoryConversationStore } from "../conversations/memoryStore";
import { ProviderError } from "../errors";
import type { CompletionRequest, CompletionResult } from "../llm/types";
import { SnapshotHolder } from "../snapshot/holder";
import { loadSnapshotIndex } from "../snapshot/indexFile";
import type { ActiveSnapshot } from "../snapshot/types";
import {
    StubChatProvider,
    StubEmbeddingProvider,
    buildIndex,
    makeTempDir,
    silentLogger,
    testConfig,
    writeSnapshotDir,
} from "../test/fixtures";
import { type RunningServer, createServer, createServerContext, startServer } from "./server";
import type { ServerContext } from "./utils/context";

const API_KEY = "test-secret";

describe("HTTP server", () => {
    let dir: string;
    let snapshot: ActiveSnapshot;
    let context: ServerContext;
    let running: RunningServer;
    let respond: (request: CompletionRequest) => Promise<CompletionResult>;

    async function boot(config: AppConfig): Promise<void> {
        const holder = new SnapshotHolder();
        holder.activate(snapshot);
        context = await createServerContext(config, holder, silentLogger, {
            llm: {
                embedding: new StubEmbeddingProvider(),
                chat: new StubChatProvider((request) => respond(request)),
            },
            store: new InMemoryConversationStore(),
        });
        running = await startServer(createServer(context, silentLogger), 0, silentLogger);
    }

    function url(route: string): string {
        return `http://127.0.0.1:${running.port}${route}`;
    }

    function post(route: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
        return fetch(url(route), {
            method: "POST",
            headers: { "Content-Type": "application/json", "x-api-key": API_KEY, ...headers },
            body: JSON.stringify(body),
        });
    }

    beforeEach(async () => {
        dir = await makeTempDir();
        await writeSnapshotDir(dir, buildIndex({ documents: 9, corpusDate: "2025-10-14" }));
        snapshot = await loadSnapshotIndex({
            installPath: dir,
            receipt: { generation: "g1", installedAt: "2025-10-14T08:00:00.000Z" },
        });
        respond = async () => ({ text: "stub answer" });
        await boot(testConfig(dir, { server: { port: 0, apiKey: API_KEY } }));
    });

    afterEach(async () => {
        await running.close();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("reports health without an API key", async () => {
        const response = await fetch(url("/health"));

        expect(response.status).toBe(200);
        await expect(response.json()).resolves.toEqual({
            status: "ok",
            totalDocuments: 9,
            fragments: 9,
            corpusDate: "2025-10-14",
            generation: "g1",
            refreshBusy: false,
        });
    });

    it("answers CORS preflight requests", async () => {
        const response = await fetch(url("/chat"), { method: "OPTIONS" });

        expect(response.status).toBe(204);
        expect(response.headers.get("access-control-allow-origin")).toBe("*");
    });

    describe("POST /chat", () => {
        it("rejects requests without a valid API key", async () => {
            const response = await post("/chat", { message: "Hi?" }, { "x-api-key": "wrong" });

            expect(response.status).toBe(401);
            await expect(response.json()).resolves.toEqual({ status: "error", message: "Invalid or missing API key." });
        });

        it("accepts a bearer token", async () => {
            const response = await post("/chat", { message: "Hi?" }, { "x-api-key": "", Authorization: `Bearer ${API_KEY}` });

            expect(response.status).toBe(200);
        });

        it("returns the answer with corpus and recording details", async () => {
            const response = await post("/chat", { message: "How many documents are indexed?", session_id: "s1" });
            const body = await response.json();

            expect(response.status).toBe(200);
            expect(body).toMatchObject({
                response: "stub answer",
                document_count: 3,
                total_documents: 9,
                conversation_id: "s1",
                sequence: 1,
                persisted: true,
            });
            const { context: preview } = z.object({ context: z.string() }).parse(body);
            expect(preview).toHaveLength(500);
            expect(preview.startsWith("Knowledge base:\n- Documents indexed: 9\n")).toBe(true);
        });

        it("uses the default session and replays an idempotency key", async () => {
            const first = await (await post("/chat", { message: "Hi?" }, { "Idempotency-Key": "k1" })).json();
            const replay = await (await post("/chat", { message: "Hi?" }, { "Idempotency-Key": "k1" })).json();
            const other = await (await post("/chat", { message: "Hi?", idempotency_key: "k2" })).json();

            expect(first).toMatchObject({ conversation_id: "default", sequence: 1 });
            expect(replay).toMatchObject({ conversation_id: "default", sequence: 1 });
            expect(other).toMatchObject({ sequence: 2 });
        });

        it("rejects an empty message", async () => {
            const response = await post("/chat", { message: "  " });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({ status: "error", message: "Question cannot be empty." });
        });

        it("rejects a body without a message", async () => {
            const response = await post("/chat", { session_id: "s1" });

            expect(response.status).toBe(400);
        });

        it("maps provider rate limiting to 429", async () => {
            respond = async () => {
                throw new ProviderError("openai completion failed: Too Many Requests", { status: 429 });
            };

            const response = await post("/chat", { message: "Hi?" });

            expect(response.status).toBe(429);
            await expect(response.json()).resolves.toEqual({
                status: "error",
                message: "Rate limit reached. Please try again in a moment.",
            });
        });

        it("maps other provider failures to 502", async () => {
            respond = async () => {
                throw new Error("upstream exploded");
            };

            const response = await post("/chat", { message: "Hi?" });

            expect(response.status).toBe(502);
            await expect(response.json()).resolves.toEqual({
                status: "error",
                message: "Completion failed: upstream exploded",
            });
        });
    });

    describe("POST /v1/chat/completions", () => {
        it("answers the last user message", async () => {
            const response = await post("/v1/chat/completions", {
                model: "kb",
                messages: [
                    { role: "user", content: "Earlier" },
                    { role: "assistant", content: "Reply" },
                    { role: "user", content: "Latest?" },
                ],
            });
            const body = await response.json();

            expect(response.status).toBe(200);
            expect(body).toMatchObject({
                object: "chat.completion",
                model: "kb",
                choices: [{ message: { role: "assistant", content: "stub answer" }, finish_reason: "stop" }],
            });
        });

        it("rejects streaming requests", async () => {
            const response = await post("/v1/chat/completions", {
                stream: true,
                messages: [{ role: "user", content: "Hi?" }],
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toMatchObject({ error: { param: "stream" } });
        });

        it("rejects requests without a user message", async () => {
            const response = await post("/v1/chat/completions", {
                messages: [{ role: "system", content: "Be brief." }],
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toMatchObject({
                error: { message: "No user message found in messages array." },
            });
        });
    });

    describe("POST /admin/refresh", () => {
        it("activates the refreshed snapshot", async () => {
            const next = { ...snapshot, generation: "g2" };
            context.refresh = async () => {
                context.holder.activate(next);
                return next;
            };

            const response = await post("/admin/refresh", {});

            expect(response.status).toBe(200);
            await expect(response.json()).resolves.toMatchObject({ status: "ok", generation: "g2", totalDocuments: 9 });
            expect(context.holder.active.generation).toBe("g2");
            expect(context.refreshBusy).toBe(false);
        });

        it("returns 409 while a refresh is running", async () => {
            let release: () => void = () => undefined;
            context.refresh = () =>
                new Promise<ActiveSnapshot>((resolve) => {
                    release = () => resolve(snapshot);
                });

            const first = post("/admin/refresh", {});
            // wait for the first request to mark the refresh busy
            while (!context.refreshBusy) {
                await new Promise((resolve) => setTimeout(resolve, 5));
            }
            const second = await post("/admin/refresh", {});
            const health = await (await fetch(url("/health"))).json();
            release();

            expect(second.status).toBe(409);
            expect(health).toMatchObject({ refreshBusy: true });
            expect((await first).status).toBe(200);
        });

        it("keeps serving the previous snapshot when the refresh fails", async () => {
            context.refresh = async () => {
                throw new Error("404 from artifact store");
            };

            const response = await post("/admin/refresh", {});

            expect(response.status).toBe(502);
            expect(context.holder.active.generation).toBe("g1");
            expect(context.refreshBusy).toBe(false);
        });
    });

    it("serves without authentication when no API key is configured", async () => {
        await running.close();
        await boot(testConfig(dir));

        const response = await fetch(url("/chat"), {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ message: "Hi?" }),
        });

        expect(response.status).toBe(200);
    });
});
