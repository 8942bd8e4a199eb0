// src/ai/textGenerator.ts

import OpenAI from "openai";
import type { Transcript } from "../types/roleplay";
import { GenerationUnavailableError, TransientGenerationError } from "../utils/errors";
import { getGenerationDefaults } from "./generationPolicy";
import type { PartnerIntent } from "./partnerIntent";

export type GenerationRequest = {
  intent: PartnerIntent;
  context: readonly string[];   // system messages, in order
  transcript: Transcript;
  temperature?: number;
  maxOutputTokens?: number;
};

export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export type OpenAITextGeneratorOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

type InputMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export function toInputMessages(request: GenerationRequest): InputMessage[] {
  const messages: InputMessage[] = request.context
    .map((c) => c.trim())
    .filter((c) => c.length > 0)
    .map((content): InputMessage => ({ role: "system", content }));

  for (const turn of request.transcript) {
    const content = turn.text.trim();
    if (!content) continue;
    messages.push({ role: turn.role === "student" ? "user" : "assistant", content });
  }
  return messages;
}

/**
 * Request/response against the OpenAI Responses API with a bounded wait.
 * A failure is reported once for this turn: the SDK's own retries are off and
 * nothing here retries either.
 */
export function createOpenAITextGenerator(opts: OpenAITextGeneratorOptions): TextGenerator {
  let client: OpenAI | null = null;

  function getClient(): OpenAI {
    if (!opts.apiKey) {
      throw new GenerationUnavailableError();
    }
    if (!client) {
      client = new OpenAI({
        apiKey: opts.apiKey,
        timeout: opts.timeoutMs,
        maxRetries: 0,
      });
    }
    return client;
  }

  return {
    async generate(request: GenerationRequest): Promise<string> {
      const openai = getClient();
      const defaults = getGenerationDefaults(request.intent);

      const temperature =
        typeof request.temperature === "number" ? request.temperature : defaults.temperature;
      const max_output_tokens =
        typeof request.maxOutputTokens === "number"
          ? request.maxOutputTokens
          : defaults.maxOutputTokens;

      let text = "";
      try {
        const response = await openai.responses.create(
          {
            model: opts.model,
            input: toInputMessages(request),
            temperature,
            max_output_tokens,
          },
          { timeout: opts.timeoutMs, maxRetries: 0 }
        );
        text = (response.output_text || "").trim();
      } catch (err) {
        throw new TransientGenerationError("Text generation failed", err);
      }

      if (!text) {
        throw new TransientGenerationError("Text generation returned no text");
      }
      return text;
    },
  };
}
