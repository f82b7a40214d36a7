/**
 * LLM-Assisted Intent Interpretation (Fallback Only)
 *
 * Purpose:
 * Propose an intent for questions the pattern classifier could not place.
 * The proposal is validated with zod and then goes through the same slot
 * validation and threshold as a pattern match.
 *
 * Invocation Rules:
 * - Only invoked when deterministic classification ends in `unknown`
 * - Only when INTENT_LLM_FALLBACK is enabled
 *
 * Any failure here throws; the caller keeps the pattern result.
 */

import { OpenAI } from "openai";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { INTENT_TYPES, type ConversationTurn } from "@shared/schema";
import { MODEL_ASSIGNMENTS } from "../config/models";
import {
  INTENT_CLASSIFICATION_TOOL_NAME,
  INTENT_INTERPRETATION_PROMPT,
  INTENT_TOOL_DESCRIPTION,
} from "../config/prompts";
import { getOpenAI } from "../llm/client";
import { ClassificationAmbiguousError } from "../utils/errorHandler";

export const llmIntentProposalSchema = z.object({
  intentType: z.enum(INTENT_TYPES),
  confidence: z.number().min(0).max(1),
  keywords: z.array(z.string().min(1)).max(5).optional(),
  authorName: z.string().min(1).optional(),
  paperId: z.string().min(1).optional(),
  paperTitle: z.string().min(1).optional(),
  field: z.string().min(1).optional(),
  timeRange: z.string().regex(/^\d+(?:year|month|week)s?$/).optional(),
  limit: z.number().int().min(1).max(50).optional(),
  yearFrom: z.number().int().optional(),
  yearTo: z.number().int().optional(),
  depth: z.number().int().min(1).max(3).optional(),
});

export type LlmIntentProposal = z.infer<typeof llmIntentProposalSchema>;

/**
 * Signature of the interpreter, so the analyzer can be given a stub.
 */
export type IntentInterpreter = (text: string, recentTurns: ConversationTurn[]) => Promise<LlmIntentProposal>;

function buildClassificationTool(): OpenAI.Chat.Completions.ChatCompletionTool {
  const jsonSchema = zodToJsonSchema(llmIntentProposalSchema, { target: "openApi3" });
  // Remove $schema wrapper that zodToJsonSchema adds
  const { $schema: _schema, ...parameters } = jsonSchema as Record<string, unknown>;

  return {
    type: "function",
    function: {
      name: INTENT_CLASSIFICATION_TOOL_NAME,
      description: INTENT_TOOL_DESCRIPTION,
      parameters,
    },
  };
}

function formatTurns(turns: ConversationTurn[]): string {
  if (turns.length === 0) return "";
  const lines = turns.map(turn => {
    const params = turn.parameters ? ` ${JSON.stringify(turn.parameters)}` : "";
    return `${turn.role}: ${turn.content.slice(0, 300)}${params}`;
  });
  return `Earlier turns:\n${lines.join("\n")}\n\n`;
}

export async function interpretQuery(
  text: string,
  recentTurns: ConversationTurn[],
  model: string = MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION,
): Promise<LlmIntentProposal> {
  const response = await getOpenAI().chat.completions.create({
    model,
    messages: [
      { role: "system", content: INTENT_INTERPRETATION_PROMPT },
      { role: "user", content: `${formatTurns(recentTurns)}Question: ${text}` },
    ],
    tools: [buildClassificationTool()],
    tool_choice: { type: "function", function: { name: INTENT_CLASSIFICATION_TOOL_NAME } },
    temperature: 0,
  });

  const toolCall = response.choices[0]?.message?.tool_calls?.[0];
  if (!toolCall || toolCall.type !== "function") {
    throw new ClassificationAmbiguousError(0, 0, "LLM returned no classification");
  }

  let args: unknown;
  try {
    args = JSON.parse(toolCall.function.arguments);
  } catch {
    throw new ClassificationAmbiguousError(0, 0, "LLM classification arguments were not valid JSON");
  }

  const parsed = llmIntentProposalSchema.safeParse(args);
  if (!parsed.success) {
    throw new ClassificationAmbiguousError(0, 0, "LLM classification did not match the expected shape");
  }

  console.log(`[Intent] LLM proposed ${parsed.data.intentType} (confidence ${parsed.data.confidence})`);
  return parsed.data;
}
