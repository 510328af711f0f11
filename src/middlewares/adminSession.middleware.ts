import { Request, RequestHandler, Response } from "express";
import { ADMIN_SESSION_HEADER, AdminSessionService } from "../services/adminSession.service";
import { AdminSession } from "../session/adminSession";
import { asyncHandler } from "./asyncHandler.middleware";

export type AuthenticatedSession = Extract<AdminSession, { status: "authenticated" }>;

export type AdminHandler = (req: Request, res: Response, session: AuthenticatedSession) => Promise<void>;

/**
 * Resolves the caller's admin session from the X-Admin-Session header and
 * hands it to the handler; requests without one get a 401.
 */
export function adminRoute(handler: AdminHandler, sessions: AdminSessionService = new AdminSessionService()): RequestHandler {
    return asyncHandler(async (req, res) => {
        const session = await sessions.requireSession(req.header(ADMIN_SESSION_HEADER));
        await handler(req, res, session);
    });
}
