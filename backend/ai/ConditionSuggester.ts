import { z } from "zod";
import type { Diagnosis } from "../domain/IntakeSession";
import { describeError } from "../domain/Errors";
import {
  buildConditionSuggestionPrompt,
  callLLM,
  extractJsonObject,
  getFallbackResponse,
  isFallback,
  LooseText,
  type LLMCaller,
  type PatientInfo,
} from "./PromptBuilders";

export const MAX_DIAGNOSES = 5;

export type ConditionSuggestion = Readonly<{
  summaryMarkdown: string;
  diagnoses: readonly Diagnosis[];

  // True when the completion service was unreachable and the canned response was used.
  fallback: boolean;
}>;

const DiagnosisSchema = z.object({ name: LooseText, explanation: LooseText });

const ConditionResponseSchema = z.object({
  summary_markdown: LooseText,
  diagnoses: z.array(DiagnosisSchema.nullable().catch(null)).optional().catch(undefined),
});

// REVIEW-FIRST POLICY:
// - Output is a list of possibilities for the patient to discuss with a clinician.
// - Output MUST NOT be used to rank or filter providers.
export async function suggestConditions(
  info: PatientInfo,
  llm: LLMCaller = callLLM,
): Promise<ConditionSuggestion> {
  const call = buildConditionSuggestionPrompt(info);

  let raw: string;
  try {
    raw = await llm(call);
  } catch (err) {
    console.warn(`[AI] ${call.task} failed, using fallback: ${describeError(err)}`);
    raw = getFallbackResponse(call.task);
  }

  const parsed = extractJsonObject(raw);
  if (!parsed) {
    console.warn(`[AI] ${call.task} returned non-JSON output.`);
    return { summaryMarkdown: "", diagnoses: [], fallback: false };
  }

  const response = ConditionResponseSchema.parse(parsed);
  const diagnoses: Diagnosis[] = (response.diagnoses ?? []).flatMap((d) =>
    d?.name ? [{ name: d.name, explanation: d.explanation }] : [],
  );

  return {
    summaryMarkdown: response.summary_markdown,
    diagnoses: diagnoses.slice(0, MAX_DIAGNOSES),
    fallback: isFallback(parsed),
  };
}
