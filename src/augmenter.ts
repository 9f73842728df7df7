import OpenAI from "openai";

import type { AppConfig } from "./env.js";
import { errorMessage, type Logger } from "./logger.js";
import { fallback, ok, type Outcome } from "./outcome.js";
import type { MovieRecord } from "./types.js";

export const SUMMARY_PLACEHOLDER = "AI summary unavailable.";

/** Given a prompt, resolve to generated text or reject. */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export function summaryPrompt(title: string): string {
  return (
    `Provide a concise, engaging summary of the movie '${title}'. ` +
    `Highlight key themes, notable performances, and overall cinematic value.`
  );
}

export function createOpenAiGenerator(
  config: Pick<AppConfig, "openAiKey" | "openAiModel" | "openAiTimeoutMs">
): TextGenerator {
  const client = new OpenAI({
    apiKey: config.openAiKey,
    timeout: config.openAiTimeoutMs,
    maxRetries: 1,
  });

  return {
    async generate(prompt: string) {
      const completion = await client.chat.completions.create({
        model: config.openAiModel,
        messages: [
          { role: "system", content: "You are a film critic who writes short, spoiler-light summaries." },
          { role: "user", content: prompt },
        ],
        temperature: 0.7,
      });
      return completion.choices[0]?.message?.content ?? "";
    },
  };
}

export class SummaryAugmenter {
  constructor(private readonly generator: TextGenerator, private readonly logger: Logger) {}

  /** Resolves with a copy of the movie carrying `ai_summary`; never rejects. */
  async augment(movie: MovieRecord): Promise<Outcome<MovieRecord>> {
    try {
      const text = (await this.generator.generate(summaryPrompt(movie.title))).trim();
      if (!text) throw new Error("empty response from text generator");
      return ok({ ...movie, ai_summary: text });
    } catch (e) {
      const reason = errorMessage(e);
      this.logger.warn(`AI summary generation failed: ${reason}`, { id: movie.id });
      return fallback({ ...movie, ai_summary: SUMMARY_PLACEHOLDER }, reason);
    }
  }
}
