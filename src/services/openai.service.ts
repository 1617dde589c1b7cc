import OpenAI from "openai";
import { z } from "zod";
import {
  CLASSIFICATION_SYSTEM_PROMPT,
  EXTRACTION_SYSTEM_PROMPT,
  buildClassificationPrompt,
  buildExtractionPrompt,
} from "../prompts";
import { Classification, LanguageService, RawExtraction } from "../types";
import { AppConfig } from "../utils/config";
import { ExtractionIncompleteError, LanguageServiceError } from "../utils/errors";
import { logger } from "../utils/logger";

/** The slice of the OpenAI client this backend calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

const ClassificationSchema = z.object({
  isJobRelated: z.boolean(),
  confidence: z.number().min(0).max(1),
});

const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? null : String(value)));

const ExtractionSchema = z.object({
  role: looseText,
  organization: looseText,
  status: looseText,
  date: looseText,
  jobDescriptionLink: looseText,
  notes: looseText,
});

const NOT_JOB_RELATED: Classification = { isJobRelated: false, confidence: 0 };

export function createOpenAIClient(config: AppConfig["openai"]): OpenAI {
  return new OpenAI({ apiKey: config.apiKey, maxRetries: 2, timeout: 30_000 });
}

export function createOpenAILanguageService(
  client: ChatCompletionClient,
  models: Pick<AppConfig["openai"], "classifyModel" | "extractModel">
): LanguageService {
  async function complete(
    model: string,
    system: string,
    prompt: string
  ): Promise<string | null> {
    try {
      const response = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
        temperature: 0.1,
        response_format: { type: "json_object" },
      });
      return response.choices[0]?.message.content ?? null;
    } catch (error) {
      throw new LanguageServiceError(`OpenAI request to ${model} failed`, {
        cause: error,
      });
    }
  }

  return {
    async classify(text: string): Promise<Classification> {
      const content = await complete(
        models.classifyModel,
        CLASSIFICATION_SYSTEM_PROMPT,
        buildClassificationPrompt(text)
      );
      const parsed = ClassificationSchema.safeParse(parseJsonObject(content));
      if (!parsed.success) {
        logger.warn("Unusable classification reply, treating as not job related", {
          content,
        });
        return NOT_JOB_RELATED;
      }
      return parsed.data;
    },

    async extract(text: string): Promise<RawExtraction> {
      const content = await complete(
        models.extractModel,
        EXTRACTION_SYSTEM_PROMPT,
        buildExtractionPrompt(text)
      );
      const parsed = ExtractionSchema.safeParse(parseJsonObject(content));
      if (!parsed.success) {
        throw new ExtractionIncompleteError(
          "Extraction reply was not the expected JSON object",
          { cause: parsed.error }
        );
      }
      return parsed.data;
    },
  };
}

/**
 * Pulls the JSON object out of a model reply. Tolerates a markdown code fence
 * around it; returns undefined when there is nothing parsable.
 */
export function parseJsonObject(content: string | null): unknown {
  if (!content) return undefined;

  let cleaned = content.trim();
  const fenced = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) cleaned = fenced[1].trim();

  const objectMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!objectMatch) return undefined;

  try {
    return JSON.parse(objectMatch[0]);
  } catch {
    return undefined;
  }
}
