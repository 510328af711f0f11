import Settings from "../config/settings";
import { describeError } from "../utils/errors";

export interface InsightRequest {
    price: number;
    age: number;
    income: number;
    trialUsed: boolean;
    marketingChannel: string;
}

/** Same shape on success and on fallback; `error` tells them apart. */
export interface InsightResult {
    recommendations: string[];
    error: string | null;
}

export interface InsightsConfig {
    apiKey: string;
    url: string;
    model: string;
    timeoutMs: number;
}

const defaultInsightsConfig: InsightsConfig = {
    apiKey: Settings.INSIGHTS_API_KEY,
    url: Settings.INSIGHTS_API_URL,
    model: Settings.INSIGHTS_MODEL,
    timeoutMs: Settings.INSIGHTS_TIMEOUT_MS,
};

export const MISSING_KEY_RECOMMENDATIONS = [
    "1. General: Review pricing strategy (Reason: API key not configured)",
    "2. Marketing: Optimize channels (Reason: Default recommendation)",
] as const;

export const FAILURE_RECOMMENDATIONS = [
    "1. System: Technical issue occurred (Reason: Unexpected error)",
    "2. General: Optimize marketing (Reason: Default recommendation)",
] as const;

export function buildInsightPrompt(request: InsightRequest, probability: number): string {
    return [
        "As an expert subscription consultant, provide 3-5 specific recommendations and action plan for optimizing subscription likelihood",
        "based on this user data:",
        `- Price: ${request.price}`,
        `- Age: ${request.age}`,
        `- Income: ${request.income}`,
        `- Trial Used: ${request.trialUsed ? "Yes" : "No"}`,
        `- Marketing Channel: ${request.marketingChannel}`,
        `- Predicted Subscription Probability: ${(probability * 100).toFixed(1)}%`,
        "Format:",
        "[Priority]. [Area]: [Action] (Rationale: [brief explanation])",
    ].join("\n");
}

function extractContent(body: unknown): string {
    if (typeof body === "object" && body !== null && "choices" in body && Array.isArray(body.choices)) {
        const [first] = body.choices;
        if (typeof first === "object" && first !== null && "message" in first) {
            const message = first.message;
            if (typeof message === "object" && message !== null && "content" in message && typeof message.content === "string") {
                return message.content;
            }
        }
    }
    throw new Error("Malformed completion response");
}

/**
 * Asks the chat-completion service for revenue recommendations. Never
 * throws: without a key, or on any network, HTTP or parsing failure, it
 * returns a fixed two-line fallback and an error description.
 */
export class InsightsService {
    constructor(private readonly config: InsightsConfig = defaultInsightsConfig) {}

    async getRecommendations(request: InsightRequest, probability: number): Promise<InsightResult> {
        if (!this.config.apiKey) {
            return { recommendations: [...MISSING_KEY_RECOMMENDATIONS], error: "API key not configured" };
        }

        try {
            const response = await fetch(this.config.url, {
                method: "POST",
                headers: {
                    Authorization: `Bearer ${this.config.apiKey}`,
                    "Content-Type": "application/json",
                },
                body: JSON.stringify({
                    model: this.config.model,
                    messages: [
                        {
                            role: "system",
                            content: "You are an expert subscription consultant providing concise, actionable recommendations.",
                        },
                        { role: "user", content: buildInsightPrompt(request, probability) },
                    ],
                    temperature: 0.7,
                    max_tokens: 1024,
                }),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });

            if (!response.ok) {
                throw new Error(`Insights service responded with ${response.status}`);
            }

            const content = extractContent(await response.json());
            return {
                recommendations: content.split("\n").filter((line) => line.trim().length > 0),
                error: null,
            };
        } catch (error) {
            return { recommendations: [...FAILURE_RECOMMENDATIONS], error: `Unexpected Error: ${describeError(error)}` };
        }
    }
}
