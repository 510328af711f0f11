import { v4 as uuidv4 } from "uuid";
import redisClient from "../config/redis";
import Settings from "../config/settings";
import {
    ADMIN_AREA,
    ANONYMOUS,
    AdminCredentials,
    AdminSession,
    SessionEvent,
    isAuthenticated,
    transition,
} from "../session/adminSession";
import { UnauthorizedError } from "../utils/errors";

export const ADMIN_SESSION_HEADER = "X-Admin-Session";

function sessionKey(token: string): string {
    return `admin:session:${token}`;
}

function parseStoredSession(raw: string): AdminSession {
    const value: unknown = JSON.parse(raw);
    if (
        typeof value === "object" &&
        value !== null &&
        "token" in value &&
        "email" in value &&
        "since" in value &&
        typeof value.token === "string" &&
        typeof value.email === "string" &&
        typeof value.since === "string"
    ) {
        return { status: "authenticated", token: value.token, email: value.email, area: ADMIN_AREA, since: value.since };
    }
    return ANONYMOUS;
}

/** Keeps admin sessions in Redis by token and runs events through the state machine. */
export class AdminSessionService {
    constructor(
        private readonly credentials: AdminCredentials = {
            email: Settings.ADMIN_EMAIL,
            password: Settings.ADMIN_PASSWORD,
        },
        private readonly ttlSeconds: number = Settings.ADMIN_SESSION_TTL,
    ) {}

    async resolve(token: string | undefined): Promise<AdminSession> {
        if (!token) return ANONYMOUS;
        const raw = await redisClient.get(sessionKey(token));
        return raw ? parseStoredSession(raw) : ANONYMOUS;
    }

    private async apply(current: AdminSession, event: SessionEvent): Promise<AdminSession> {
        const { state, accepted } = transition(current, event, this.credentials);
        if (!accepted) {
            throw new UnauthorizedError("Invalid admin credentials");
        }

        if (isAuthenticated(current) && (!isAuthenticated(state) || state.token !== current.token)) {
            await redisClient.del(sessionKey(current.token));
        }
        if (isAuthenticated(state)) {
            await redisClient.setEx(sessionKey(state.token), this.ttlSeconds, JSON.stringify(state));
        }
        return state;
    }

    async login(email: string, password: string, now: Date = new Date()): Promise<AdminSession> {
        return this.apply(ANONYMOUS, { type: "login", email, password, token: uuidv4(), at: now });
    }

    async logout(token: string | undefined): Promise<AdminSession> {
        return this.apply(await this.resolve(token), { type: "logout" });
    }

    async navigate(token: string | undefined, page: string): Promise<AdminSession> {
        return this.apply(await this.resolve(token), { type: "navigate", page });
    }

    async requireSession(token: string | undefined): Promise<Extract<AdminSession, { status: "authenticated" }>> {
        const session = await this.resolve(token);
        if (!isAuthenticated(session)) {
            throw new UnauthorizedError("Admin session required");
        }
        return session;
    }
}
