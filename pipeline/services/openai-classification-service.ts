import { z } from "zod";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_VIBE_MODEL = "gpt-4o-mini";

export interface ClassificationRequest {
  model: string;
  system: string;
  prompt: string;
}

/** The external classification capability: prompt in, raw completion text out. */
export interface ClassificationService {
  complete(request: ClassificationRequest): Promise<string>;
}

interface OpenAiClassificationServiceOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  rateLimitRetries?: number;
  maxTokens?: number;
  sleep?: (ms: number) => Promise<void>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional()
      })
    )
    .optional()
});

/**
 * Chat-completions client for any OpenAI-compatible endpoint. HTTP 429 is
 * retried after `retry-after`; any other failure throws.
 */
export class OpenAiClassificationService implements ClassificationService {
  private readonly apiKey: string;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly rateLimitRetries: number;

  private readonly maxTokens: number;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OpenAiClassificationServiceOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.rateLimitRetries = options.rateLimitRetries ?? 2;
    this.maxTokens = options.maxTokens ?? 4_000;
    this.sleep =
      options.sleep ??
      (async (ms) => {
        await new Promise((resolve) => {
          setTimeout(resolve, ms);
        });
      });
  }

  async complete(request: ClassificationRequest): Promise<string> {
    const maxAttempts = this.rateLimitRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: request.model,
          temperature: 0,
          max_tokens: this.maxTokens,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt }
          ]
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (response.status === 429 && attempt < maxAttempts) {
        const retryAfterHeader = response.headers.get("retry-after");
        const retryAfterSeconds = retryAfterHeader ? Number.parseInt(retryAfterHeader, 10) : Number.NaN;
        const retryAfterMs = Number.isFinite(retryAfterSeconds)
          ? Math.max(1_000, retryAfterSeconds * 1_000)
          : 15_000;
        await this.sleep(retryAfterMs);
        continue;
      }

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new Error(`Classification request failed (${response.status}): ${body.slice(0, 240)}`);
      }

      const payload = chatCompletionSchema.parse(await response.json());
      const content = payload.choices?.[0]?.message?.content;
      if (!content) {
        throw new Error("Classification response did not include any content.");
      }
      return content;
    }

    throw new Error("Classification request did not complete after retries.");
  }
}
