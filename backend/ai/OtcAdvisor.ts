import { z } from "zod";
import { describeError } from "../domain/Errors";
import {
  buildOtcSuggestionPrompt,
  callLLM,
  extractJsonObject,
  isFallback,
  LooseText,
  LooseTextList,
  type LLMCaller,
  type OtcProfile,
} from "./PromptBuilders";

export type OtcRecommendation = Readonly<{
  name: string;
  purpose: string;
  dosageGeneral: string;
  notes: string;
}>;

export type OtcSuggestions = Readonly<{
  recommendations: readonly OtcRecommendation[];
  redFlags: readonly string[];
  whenToSeekCare: readonly string[];
  lifestyle: readonly string[];
}>;

export type OtcAdvice = Readonly<{
  suggestions: OtcSuggestions | null;
  fallbackList: readonly string[];
}>;

// Shown whenever AI suggestions are missing.
export const GENERIC_OTC_OPTIONS: readonly string[] = [
  "Acetaminophen (Tylenol) for pain or fever, following label directions",
  "Ibuprofen (Advil, Motrin) for pain or inflammation, if not contraindicated",
  "Saline nasal spray for nasal congestion",
  "Cough drops or honey (age 1+) for sore throat or cough",
];

const RecommendationSchema = z.object({
  name: LooseText,
  purpose: LooseText,
  dosage_general: LooseText,
  notes: LooseText,
});

const OtcResponseSchema = z.object({
  otc_recommendations: z.array(RecommendationSchema.nullable().catch(null)).optional().catch(undefined),
  red_flags: LooseTextList,
  when_to_seek_care: LooseTextList,
  lifestyle: LooseTextList,
});

export function parseOtcSuggestions(raw: string): OtcSuggestions | null {
  const parsed = extractJsonObject(raw);
  if (!parsed || isFallback(parsed)) return null;

  const response = OtcResponseSchema.parse(parsed);
  return {
    recommendations: (response.otc_recommendations ?? []).flatMap((r) =>
      r?.name ? [{ name: r.name, purpose: r.purpose, dosageGeneral: r.dosage_general, notes: r.notes }] : [],
    ),
    redFlags: response.red_flags,
    whenToSeekCare: response.when_to_seek_care,
    lifestyle: response.lifestyle,
  };
}

export async function suggestOtc(profile: OtcProfile, llm: LLMCaller = callLLM): Promise<OtcAdvice> {
  if (!profile.conditionSummary.trim()) throw new Error("OTC suggestions require a condition summary.");

  const call = buildOtcSuggestionPrompt(profile);
  try {
    const suggestions = parseOtcSuggestions(await llm(call));
    if (!suggestions) console.warn(`[AI] ${call.task} returned no usable JSON.`);
    return { suggestions, fallbackList: GENERIC_OTC_OPTIONS };
  } catch (err) {
    console.warn(`[AI] ${call.task} failed: ${describeError(err)}`);
    return { suggestions: null, fallbackList: GENERIC_OTC_OPTIONS };
  }
}
