import {
    FAILURE_RECOMMENDATIONS,
    InsightRequest,
    InsightsService,
    MISSING_KEY_RECOMMENDATIONS,
    buildInsightPrompt,
} from "../../../src/services/insights.service";

const request: InsightRequest = {
    price: 270,
    age: 35,
    income: 50000,
    trialUsed: true,
    marketingChannel: "Services",
};

const config = {
    apiKey: "test-secret",
    url: "http://insights.test/v1/chat/completions",
    model: "test-model",
    timeoutMs: 10000,
};

function completion(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), {
        status: 200,
        headers: { "Content-Type": "application/json" },
    });
}

describe("InsightsService", () => {
    let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

    beforeEach(() => {
        fetchSpy = jest.spyOn(globalThis, "fetch");
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("returns the fallback without calling out when no key is configured", async () => {
        const service = new InsightsService({ ...config, apiKey: "" });

        const result = await service.getRecommendations(request, 0.6);

        expect(result).toEqual({ recommendations: MISSING_KEY_RECOMMENDATIONS, error: "API key not configured" });
        expect(fetchSpy).not.toHaveBeenCalled();
    });

    it("hands out a fresh fallback list on every call", async () => {
        const service = new InsightsService({ ...config, apiKey: "" });

        const first = await service.getRecommendations(request, 0.6);
        first.recommendations.push("3. Extra: added by the caller");
        const second = await service.getRecommendations(request, 0.6);

        expect(second.recommendations).toEqual([...MISSING_KEY_RECOMMENDATIONS]);
        expect(second.recommendations).not.toBe(first.recommendations);
    });

    it("splits the completion into non-empty lines", async () => {
        fetchSpy.mockResolvedValue(completion("1. Pricing: Offer annual plans (Rationale: churn)\n\n2. Marketing: Referral bonus\n"));
        const service = new InsightsService(config);

        const result = await service.getRecommendations(request, 0.6);

        expect(result).toEqual({
            recommendations: ["1. Pricing: Offer annual plans (Rationale: churn)", "2. Marketing: Referral bonus"],
            error: null,
        });
    });

    it("posts the chat request with the bearer key", async () => {
        fetchSpy.mockResolvedValue(completion("1. General: Keep going"));
        const service = new InsightsService(config);

        await service.getRecommendations(request, 0.6);

        const [url, init] = fetchSpy.mock.calls[0];
        expect(url).toBe(config.url);
        expect(init?.method).toBe("POST");
        expect(init?.headers).toEqual({
            Authorization: "Bearer test-secret",
            "Content-Type": "application/json",
        });
        expect(JSON.parse(String(init?.body))).toMatchObject({
            model: "test-model",
            temperature: 0.7,
            max_tokens: 1024,
            messages: [{ role: "system" }, { role: "user", content: buildInsightPrompt(request, 0.6) }],
        });
    });

    it("falls back on an HTTP error", async () => {
        fetchSpy.mockResolvedValue(new Response("rate limited", { status: 429 }));
        const service = new InsightsService(config);

        const result = await service.getRecommendations(request, 0.6);

        expect(result).toEqual({
            recommendations: FAILURE_RECOMMENDATIONS,
            error: "Unexpected Error: Insights service responded with 429",
        });
    });

    it("falls back when the request fails", async () => {
        fetchSpy.mockRejectedValue(new Error("connect ECONNREFUSED"));
        const service = new InsightsService(config);

        const result = await service.getRecommendations(request, 0.6);

        expect(result).toEqual({ recommendations: FAILURE_RECOMMENDATIONS, error: "Unexpected Error: connect ECONNREFUSED" });
    });

    it("falls back on an unexpected response shape", async () => {
        fetchSpy.mockResolvedValue(new Response(JSON.stringify({ data: [] }), { status: 200 }));
        const service = new InsightsService(config);

        const result = await service.getRecommendations(request, 0.6);

        expect(result.error).toBe("Unexpected Error: Malformed completion response");
    });
});

describe("buildInsightPrompt", () => {
    it("includes the user data and the probability as a percentage", () => {
        const prompt = buildInsightPrompt(request, 0.6);

        expect(prompt).toContain("- Trial Used: Yes");
        expect(prompt).toContain("- Marketing Channel: Services");
        expect(prompt).toContain("- Predicted Subscription Probability: 60.0%");
    });
});
