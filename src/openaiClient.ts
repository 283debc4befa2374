import OpenAI from "openai";
import type { Settings } from "./config";
import { createLogger } from "./logger";

const log = createLogger("llm");

/** Reply text plus why generation stopped ("stop", "length", ...). */
export interface Completion {
    text: string;
    finishReason: string;
}

export interface QuickCompleter {
    quickComplete(prompt: string): Promise<string>;
}

export interface ReasoningService extends QuickCompleter {
    readonly model: string;
    complete(systemPrompt: string, userMessage: string): Promise<Completion>;
}

// gpt-5 / o-series take max_completion_tokens and no temperature
const MAX_COMPLETION_TOKEN_MODELS = ["gpt-5", "o1", "o3", "o4-mini", "model-router"];

export function needsMaxCompletionTokens(model: string): boolean {
    const m = model.toLowerCase();
    return MAX_COMPLETION_TOKEN_MODELS.some((p) => m === p || m.startsWith(`${p}-`) || m.startsWith(`${p}.`));
}

let _client: OpenAI | null = null;
export function getOpenAI(settings: Settings["llm"]) {
    if (_client) return _client;
    _client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL });
    return _client;
}

export class OpenAIReasoningService implements ReasoningService {
    private readonly client: OpenAI;

    constructor(private readonly settings: Settings["llm"], client?: OpenAI) {
        this.client = client ?? getOpenAI(settings);
    }

    get model() {
        return this.settings.model;
    }

    async complete(systemPrompt: string, userMessage: string): Promise<Completion> {
        const model = this.settings.model;
        const messages = [
            { role: "system" as const, content: systemPrompt },
            { role: "user" as const, content: userMessage },
        ];
        const res = needsMaxCompletionTokens(model)
            ? await this.client.chat.completions.create({
                  model,
                  messages,
                  max_completion_tokens: this.settings.maxTokens,
              })
            : await this.client.chat.completions.create({
                  model,
                  messages,
                  max_tokens: this.settings.maxTokens,
                  temperature: 0,
              });
        const choice = res.choices[0];
        const finishReason = choice?.finish_reason ?? "stop";
        if (finishReason === "length") log.warn(`Completion hit the token limit (${this.settings.maxTokens})`);
        return { text: choice?.message?.content ?? "", finishReason };
    }

    /** Cheap single-turn call on the utility model, bounded by the label timeout. */
    async quickComplete(prompt: string): Promise<string> {
        const res = await this.client.chat.completions.create(
            {
                model: this.settings.utilityModel,
                messages: [{ role: "user", content: prompt }],
                max_tokens: 60,
                temperature: 0,
            },
            { timeout: this.settings.labelTimeoutMs, maxRetries: 0 },
        );
        return (res.choices[0]?.message?.content ?? "").trim();
    }
}
