export const ADMIN_AREA = "admin";

export type AdminSession =
    | { status: "anonymous" }
    | { status: "authenticated"; token: string; email: string; area: typeof ADMIN_AREA; since: string };

export interface AdminCredentials {
    email: string;
    password: string;
}

export type SessionEvent =
    | { type: "login"; email: string; password: string; token: string; at: Date }
    | { type: "logout" }
    | { type: "navigate"; page: string };

export interface Transition {
    state: AdminSession;
    // false only when a login was attempted with the wrong credentials
    accepted: boolean;
}

export const ANONYMOUS: AdminSession = { status: "anonymous" };

/**
 * Pure session state machine. Logging in with the configured pair enters the
 * admin area; logging out or navigating to any other page clears the session.
 * A failed login leaves the current state untouched.
 */
export function transition(state: AdminSession, event: SessionEvent, credentials: AdminCredentials): Transition {
    switch (event.type) {
        case "login":
            if (event.email !== credentials.email || event.password !== credentials.password) {
                return { state, accepted: false };
            }
            return {
                state: {
                    status: "authenticated",
                    token: event.token,
                    email: event.email,
                    area: ADMIN_AREA,
                    since: event.at.toISOString(),
                },
                accepted: true,
            };
        case "logout":
            return { state: ANONYMOUS, accepted: true };
        case "navigate":
            return { state: event.page === ADMIN_AREA ? state : ANONYMOUS, accepted: true };
    }
}

export function isAuthenticated(
    session: AdminSession,
): session is Extract<AdminSession, { status: "authenticated" }> {
    return session.status === "authenticated";
}
