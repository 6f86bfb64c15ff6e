import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { ActiveSnapshot } from "../../snapshot/types";
import { describeError } from "../../errors";

export interface RefreshRouteContext {
    refresh: () => Promise<ActiveSnapshot>;
    isRefreshBusy: () => boolean;
    setRefreshBusy: (busy: boolean) => void;
}

export async function handleRefreshRequest(
    _req: Request,
    res: Response,
    context: RefreshRouteContext,
    logger: Logger
): Promise<void> {
    if (context.isRefreshBusy()) {
        res.status(409).json({ status: "error", message: "Snapshot refresh already running." });
        return;
    }

    context.setRefreshBusy(true);
    const startedAt = Date.now();

    try {
        logger.info("Starting snapshot refresh.");
        const snapshot = await context.refresh();
        res.json({
            status: "ok",
            generation: snapshot.generation,
            totalDocuments: snapshot.metadata.documentCount,
            corpusDate: snapshot.metadata.corpusDate,
            durationMs: Date.now() - startedAt,
        });
    } catch (error) {
        // the previous snapshot keeps serving
        logger.error({ err: error }, "Snapshot refresh failed.");
        res.status(502).json({ status: "error", message: describeError(error) });
    } finally {
        context.setRefreshBusy(false);
    }
}
