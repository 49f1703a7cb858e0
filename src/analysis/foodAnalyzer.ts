import { z } from "zod";
import type { Env } from "../config/env";
import { httpFetch } from "../http/client";
import { logger } from "../logger";

const API_VERSION = "2023-06-01";
const MAX_TOKENS = 1000;

export const FOOD_ANALYSIS_PROMPT = [
  "Analyze this photo of food and answer strictly in the following format:",
  "",
  "Dish: [specific dish name]",
  "Weight: [number] g",
  "Calories: [number] kcal",
  "Protein: [number] g",
  "Fat: [number] g",
  "Carbs: [number] g",
  "",
  "Rules:",
  "- Give exact numbers, not ranges.",
  "- If you cannot tell precisely, give the most likely value.",
  "- Use only numbers and units (g, kcal).",
  "- Do not add any other words or explanations.",
  "",
  "Example:",
  "Dish: Rice with vegetables and egg",
  "Weight: 200 g",
  "Calories: 400 kcal",
  "Protein: 12 g",
  "Fat: 8 g",
  "Carbs: 65 g"
].join("\n");

const MessagesResponseSchema = z.object({
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional()
      })
      .passthrough()
  )
});

export class AnalysisError extends Error {
  /** HTTP status of the failed call, or null when the body was unusable. */
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AnalysisError";
    this.status = options.status ?? null;
  }
}

export type FoodAnalyzer = {
  /** Returns the model's plain-text answer for a JPEG photo. */
  analyzeFoodImage(imageBytes: Uint8Array): Promise<string>;
};

export function createFoodAnalyzer(params: {
  env: Pick<Env, "ANTHROPIC_API_KEY" | "ANALYSIS_MODEL" | "ANALYSIS_API_BASE_URL" | "ANALYSIS_TIMEOUT_MS">;
  maxRetries?: number;
}): FoodAnalyzer {
  const { env, maxRetries = 2 } = params;
  const url = `${env.ANALYSIS_API_BASE_URL.replace(/\/$/, "")}/v1/messages`;

  return {
    async analyzeFoodImage(imageBytes) {
      const body = {
        model: env.ANALYSIS_MODEL,
        max_tokens: MAX_TOKENS,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: FOOD_ANALYSIS_PROMPT },
              {
                type: "image",
                source: {
                  type: "base64",
                  media_type: "image/jpeg",
                  data: Buffer.from(imageBytes).toString("base64")
                }
              }
            ]
          }
        ]
      };

      const resp = await httpFetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-api-key": env.ANTHROPIC_API_KEY,
          "anthropic-version": API_VERSION
        },
        body: JSON.stringify(body),
        timeoutMs: env.ANALYSIS_TIMEOUT_MS,
        maxRetries,
        // Analysis has no side effects, so a repeated POST is safe.
        idempotent: true,
        requestName: "food_analysis",
        logMeta: { model: env.ANALYSIS_MODEL, imageBytes: imageBytes.byteLength }
      });

      if (!resp.ok) {
        const errorText = await resp.text().catch(() => "Unable to read error response");
        logger.warn({ status: resp.status, errorText }, "Food analysis request failed");
        throw new AnalysisError(`Analysis request failed with status ${resp.status}`, { status: resp.status });
      }

      let json: unknown;
      try {
        json = await resp.json();
      } catch (err) {
        throw new AnalysisError("Analysis response was not JSON", { cause: err });
      }

      const parsed = MessagesResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new AnalysisError("Analysis response had an unexpected shape", { cause: parsed.error });
      }

      const text = parsed.data.content.find((block) => block.type === "text" && block.text)?.text?.trim();
      if (!text) {
        throw new AnalysisError("Analysis response contained no text");
      }

      logger.debug({ text }, "Food analysis text received");
      return text;
    }
  };
}
