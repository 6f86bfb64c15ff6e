import type { NextFunction, Request, Response } from "express";

export function applyCors(req: Request, res: Response, next: NextFunction): void {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, X-API-Key, Idempotency-Key");
    if (req.method === "OPTIONS") {
        res.sendStatus(204);
        return;
    }
    next();
}
