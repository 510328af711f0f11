import { Request, Response, NextFunction } from "express";
import { QueryFailedError, EntityNotFoundError } from "typeorm";
import { AppError } from "../utils/errors";
import ErrorResponse from "../interfaces/errorResponse.interface";

// body-parser marks malformed JSON with a 4xx status
function clientStatus(err: unknown): number | null {
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
        return err.status >= 400 && err.status < 500 ? err.status : null;
    }
    return null;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
    let errorResponse: ErrorResponse;

    if (err instanceof AppError) {
        errorResponse = {
            message: err.message,
            statusCode: err.statusCode,
        };
    }
    else if (err instanceof EntityNotFoundError) {
        errorResponse = {
            message: "Resource not found",
            statusCode: 404,
        };
    }
    // duplicate key, constraint violation, bad SQL
    else if (err instanceof QueryFailedError) {
        console.error("Query failed:", err.message);
        errorResponse = {
            message: err.message || "Database query failed",
            statusCode: 400,
        };
    }
    else if (clientStatus(err) !== null) {
        errorResponse = {
            message: "Malformed request body",
            statusCode: clientStatus(err) ?? 400,
        };
    }
    else {
        errorResponse = {
            message: "Internal Server Error",
            statusCode: 500,
        };
        console.error("Unexpected error:", err);
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}
