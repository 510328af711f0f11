import { NextFunction, Request, RequestHandler, Response } from "express";

/** Express 4 does not forward rejected promises; route them to the error handler. */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
