import OpenAI from "openai";
import { z } from "zod";
import { getConfig } from "../config";

// This file builds deterministic, task-specific prompts from intake data.
// It also holds the only gateway this backend uses to reach the completion service (`callLLM`).
// Task modules accept an `LLMCaller` so tests can substitute a fake.

export type TaskName = "Condition Suggestion" | "OTC Suggestion";

export interface LLMCall {
  readonly task: TaskName;
  readonly system: string;
  readonly prompt: string;
  readonly temperature: number;
  readonly maxTokens?: number;

  // Ask the service for a JSON object response.
  readonly jsonMode: boolean;
}

export type LLMCaller = (call: LLMCall) => Promise<string>;

export interface PatientInfo {
  readonly symptoms: readonly string[];
  readonly age?: number;
  readonly sex?: string;
  readonly duration?: string;
}

export interface OtcProfile {
  readonly conditionSummary: string;
  readonly age?: number;
  readonly allergies?: string;
  readonly medications?: string;
}

export function stableJsonStringify(value: unknown): string {
  // Deterministic JSON: sorts object keys recursively.
  const normalize = (v: unknown): unknown => {
    if (v === null || typeof v !== "object") return v;
    if (Array.isArray(v)) return v.map(normalize);

    const out: Record<string, unknown> = {};
    for (const [k, inner] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[k] = normalize(inner);
    }
    return out;
  };

  return JSON.stringify(normalize(value));
}

export function describePatient(info: PatientInfo): string {
  let text = "";
  if (info.symptoms.length) text += `Symptoms: ${info.symptoms.join(", ")}. `;
  if (info.age !== undefined) text += `Age: ${info.age}. `;
  if (info.sex) text += `Sex: ${info.sex}. `;
  if (info.duration) text += `Duration: ${info.duration}. `;
  return text.trim();
}

export function buildConditionSuggestionPrompt(info: PatientInfo): LLMCall {
  const patient = describePatient(info) || "No symptoms provided.";

  return {
    task: "Condition Suggestion",
    system:
      "You are a careful medical triage assistant. Return JSON only (no prose) with keys: " +
      "`summary_markdown` (a concise Markdown list of up to 5 likely conditions + short explanations + a brief disclaimer), " +
      "and `diagnoses` (an array of objects with `name` and `explanation`, max 5).",
    prompt: `${patient} Provide likely conditions.`,
    temperature: 0.3,
    maxTokens: 700,
    jsonMode: true,
  };
}

export function buildOtcSuggestionPrompt(profile: OtcProfile): LLMCall {
  const payload = {
    age: profile.age ?? "unknown",
    allergies: profile.allergies || "unknown",
    currentMedications: profile.medications || "unknown",
    symptomSummary: profile.conditionSummary,
  };

  // Task-specific prompt. Do not reuse for other tasks.
  const prompt =
    "USER PROFILE AND SYMPTOM SUMMARY:\n" +
    stableJsonStringify(payload) +
    "\n\n" +
    "OUTPUT STRICTLY AS COMPACT JSON with keys:\n" +
    "{\n" +
    '  "otc_recommendations": [\n' +
    '    {"name": "...", "purpose": "...", "dosage_general": "...", "notes": "..."}\n' +
    "  ],\n" +
    '  "red_flags": ["..."],\n' +
    '  "when_to_seek_care": ["..."],\n' +
    '  "lifestyle": ["..."]\n' +
    "}";

  return {
    task: "OTC Suggestion",
    system:
      "You are a careful, concise clinical assistant. " +
      "Provide OTC symptom-relief options only (no diagnosis). " +
      "Never give personalized dosing; give general label-based guidance only. " +
      "Flag dangerous symptoms and advise when to seek urgent/non-urgent care. " +
      "Be brief and practical; US OTC context.",
    prompt,
    temperature: 0.2,
    jsonMode: false,
  };
}

let client: OpenAI | undefined;

function getOpenAIClient(): OpenAI {
  const apiKey = getConfig().openai.apiKey;
  if (!apiKey) throw new Error("Missing OPENAI_API_KEY. Set it in your environment (.env).");
  if (!client) client = new OpenAI({ apiKey, timeout: 30_000, maxRetries: 1 });
  return client;
}

export const callLLM: LLMCaller = async (call) => {
  const completion = await getOpenAIClient().chat.completions.create({
    model: getConfig().openai.model,
    messages: [
      { role: "system", content: call.system },
      { role: "user", content: call.prompt },
    ],
    temperature: call.temperature,
    ...(call.maxTokens ? { max_tokens: call.maxTokens } : {}),
    ...(call.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
  });

  const content = completion.choices[0]?.message.content;
  if (!content) throw new Error(`Completion service returned no content (task: ${call.task}).`);
  return content;
};

// Accepts a bare JSON object, or one wrapped in prose/code fences. Returns null when none parses.
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return null;
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

// Field schemas for model output. A field of the wrong shape reads as empty instead of failing the response.
export const LooseText = z
  .string()
  .optional()
  .catch(undefined)
  .transform((v) => v?.trim() ?? "");

export const LooseTextList = z
  .array(z.unknown())
  .optional()
  .catch(undefined)
  .transform((items) =>
    (items ?? []).filter((v): v is string => typeof v === "string" && v.trim().length > 0).map((v) => v.trim()),
  );

// Deterministic responses for when the completion service is unreachable.
// Marked FALLBACK so callers can tell them apart from real output.
const FALLBACK_RESPONSES: Record<TaskName, string> = {
  "Condition Suggestion": JSON.stringify({
    FALLBACK: true,
    summary_markdown:
      "_AI suggestions are temporarily unavailable._\n\n" +
      "This tool does not provide medical diagnoses. Please consult a qualified clinician.",
    diagnoses: [],
  }),
  "OTC Suggestion": JSON.stringify({
    FALLBACK: true,
    otc_recommendations: [],
    red_flags: [],
    when_to_seek_care: [],
    lifestyle: [],
  }),
};

export function getFallbackResponse(task: TaskName): string {
  return FALLBACK_RESPONSES[task];
}

export function isFallback(parsed: Record<string, unknown> | null): boolean {
  return parsed?.["FALLBACK"] === true;
}
