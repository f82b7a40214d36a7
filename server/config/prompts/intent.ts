/**
 * Intent Prompts
 *
 * Used only by the LLM fallback in the Decision Layer, when the pattern
 * classifier cannot clear the confidence threshold.
 */

export const INTENT_CLASSIFICATION_TOOL_NAME = "classify_research_intent";

export const INTENT_INTERPRETATION_PROMPT = `You classify questions sent to an academic research assistant.

SUPPORTED INTENTS:
- search_papers: find papers on a topic. Requires keywords.
- author_info: look up a researcher and their papers. Requires authorName.
- citation_analysis: citations and citation network of one paper. Requires paperId or paperTitle.
- trend_analysis: trending papers, optionally within a field and time range (e.g. "1year", "5years").
- keyword_analysis: most frequent keywords, optionally within a field.
- unknown: anything else, or when a required value cannot be determined.

RULES:
1. Always call ${INTENT_CLASSIFICATION_TOOL_NAME} exactly once.
2. Only fill values that are stated in the question or in the earlier turns shown.
3. Never invent paper titles, identifiers or author names.
4. Confidence is between 0 and 1. Use below 0.5 when you are guessing.`;

export const INTENT_TOOL_DESCRIPTION =
  "Record the intent of the user's research question and the values needed to answer it.";
