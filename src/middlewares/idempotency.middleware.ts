import { Request, Response, NextFunction } from "express";
import { BadRequestError } from "../utils/errors";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";

const idempotencyKeyPattern = /^[a-zA-Z0-9_-]{8,64}$/;

export function readIdempotencyKey(req: Request): string {
    const idempotencyKey = req.header(IDEMPOTENCY_HEADER);
    if (!idempotencyKey) {
        throw new BadRequestError("Idempotency-Key header is required");
    }
    if (!idempotencyKeyPattern.test(idempotencyKey)) {
        throw new BadRequestError(
            "Idempotency-Key must be 8-64 characters long and contain only alphanumeric characters, hyphens, and underscores",
        );
    }
    return idempotencyKey;
}

/** Rejects create requests without a usable Idempotency-Key before the body is validated. */
export function idempotencyMiddleware(req: Request, _res: Response, next: NextFunction) {
    try {
        readIdempotencyKey(req);
    } catch (error) {
        next(error);
        return;
    }
    next();
}
