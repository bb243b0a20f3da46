import { GoogleGenAI } from "@google/genai";
import { AiValue, Classification } from "../types/inquiry";

export const INVESTMENT_THESIS =
  "Our investment thesis focuses on B2B SaaS companies in Pakistan with early traction.";

/**
 * Single-shot text completion
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

/**
 * Gemini completion via @google/genai
 */
export function createGeminiGenerator(apiKey: string, model: string): TextGenerator {
  return {
    async generate(prompt: string): Promise<string> {
      if (!apiKey) {
        throw new Error("GOOGLE_GEMINI_API_KEY is not configured");
      }

      const ai = new GoogleGenAI({ apiKey });
      const response = await ai.models.generateContent({
        model,
        contents: prompt,
      });

      return response.text ?? "";
    },
  };
}

export function buildClassificationPrompt(description: string): string {
  return `
As a venture capital analyst, review the following inbound partnership opportunity.
${INVESTMENT_THESIS}

Opportunity Description: "${description}"

Analyze the description and provide a JSON object with three keys:
1. "summary": A one-sentence summary of the company's business model.
2. "alignment_score": An integer score from 1 (poor fit) to 5 (perfect fit) based on our investment thesis.
3. "suggested_next_step": A brief, actionable next step for our team (e.g., "Request pitch deck," "Schedule initial screening call," or "Forward to portfolio company for partnership").

Respond with ONLY the valid JSON object and nothing else.
`;
}

/**
 * Drop markdown code fences the model tends to wrap JSON in
 */
export function stripCodeFences(text: string): string {
  return text.trim().replace(/```json/g, "").replace(/```/g, "").trim();
}

/**
 * Scalars pass through untouched; nested values become their JSON text
 */
function readValue(value: unknown): AiValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the model's answer; null when it is not a JSON object
 * Missing keys read as null; no type or range check on any field
 */
export function parseClassification(text: string): Classification | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[classifier] Failed to parse JSON response:", message);
    return null;
  }

  if (!isJsonObject(parsed)) {
    console.error("[classifier] Response is not a JSON object");
    return null;
  }

  return {
    summary: readValue(parsed.summary),
    alignmentScore: readValue(parsed.alignment_score),
    suggestedNextStep: readValue(parsed.suggested_next_step),
  };
}

/**
 * Classify one opportunity description against the thesis
 * Call and parse failures are logged and yield null; no retry
 */
export async function classifyDescription(
  description: string,
  generator: TextGenerator
): Promise<Classification | null> {
  let raw: string;
  try {
    raw = await generator.generate(buildClassificationPrompt(description));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[classifier] Error during AI analysis:", message);
    return null;
  }

  const classification = parseClassification(raw);
  if (classification) {
    console.log(`[classifier] AI analysis successful: Score = ${classification.alignmentScore}`);
  }
  return classification;
}
