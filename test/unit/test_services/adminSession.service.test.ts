import redisClient from "../../../src/config/redis";
import { AdminSessionService } from "../../../src/services/adminSession.service";
import { UnauthorizedError } from "../../../src/utils/errors";

// In-memory stand-in for the session store
jest.mock("../../../src/config/redis", () => {
    const store = new Map<string, string>();
    return {
        get: jest.fn(async (key: string) => store.get(key) ?? null),
        setEx: jest.fn(async (key: string, _ttl: number, value: string) => {
            store.set(key, value);
            return "OK";
        }),
        del: jest.fn(async (key: string) => (store.delete(key) ? 1 : 0)),
    };
});

describe("AdminSessionService", () => {
    const service = new AdminSessionService({ email: "admin@example.com", password: "test-secret" }, 600);

    it("stores a session on login and resolves it by token", async () => {
        const session = await service.login("admin@example.com", "test-secret", new Date("2026-10-19T08:00:00.000Z"));
        if (session.status !== "authenticated") throw new Error("expected an authenticated session");

        expect(redisClient.setEx).toHaveBeenCalledWith(`admin:session:${session.token}`, 600, JSON.stringify(session));
        await expect(service.resolve(session.token)).resolves.toEqual(session);
        await expect(service.requireSession(session.token)).resolves.toEqual(session);
    });

    it("rejects wrong credentials", async () => {
        await expect(service.login("admin@example.com", "nope")).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it("drops the stored session when leaving the admin area", async () => {
        const session = await service.login("admin@example.com", "test-secret");
        if (session.status !== "authenticated") throw new Error("expected an authenticated session");

        await expect(service.navigate(session.token, "finance")).resolves.toEqual({ status: "anonymous" });
        expect(redisClient.del).toHaveBeenCalledWith(`admin:session:${session.token}`);
        await expect(service.requireSession(session.token)).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it("logs out", async () => {
        const session = await service.login("admin@example.com", "test-secret");
        if (session.status !== "authenticated") throw new Error("expected an authenticated session");

        await service.logout(session.token);

        await expect(service.resolve(session.token)).resolves.toEqual({ status: "anonymous" });
    });

    it("treats a missing token as anonymous", async () => {
        await expect(service.resolve(undefined)).resolves.toEqual({ status: "anonymous" });
        await expect(service.requireSession(undefined)).rejects.toThrow("Admin session required");
    });
});
