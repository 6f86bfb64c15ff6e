import type { Request, Response } from "express";
import type { SnapshotHolder } from "../../snapshot/holder";

export interface HealthRouteContext {
    holder: SnapshotHolder;
    refreshBusy: boolean;
}

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    const snapshot = context.holder.peek();
    if (!snapshot) {
        res.status(503).json({ status: "starting", refreshBusy: context.refreshBusy });
        return;
    }

    res.json({
        status: "ok",
        totalDocuments: snapshot.metadata.documentCount,
        fragments: snapshot.metadata.fragmentCount,
        corpusDate: snapshot.metadata.corpusDate,
        generation: snapshot.generation,
        refreshBusy: context.refreshBusy,
    });
}
