/**
 * Data service tools.
 *
 * Each entry validates the arguments the dispatcher builds before the call
 * reaches the Protocol Client. The registry is keyed by tool name so a
 * missing definition is a compile error.
 *
 * Layer: MCP (tool vocabulary)
 */

import type { ToolDefinition, ToolName } from "../types";
import { searchPapers } from "./searchPapers";
import { getPaperDetails } from "./getPaperDetails";
import { getPaperCitations } from "./getPaperCitations";
import { getCitationNetwork } from "./getCitationNetwork";
import { searchAuthors } from "./searchAuthors";
import { getAuthorPapers } from "./getAuthorPapers";
import { getTrendingPapers } from "./getTrendingPapers";
import { getTopKeywords } from "./getTopKeywords";

export const TOOL_REGISTRY: Record<ToolName, ToolDefinition> = {
  search_papers: searchPapers,
  get_paper_details: getPaperDetails,
  get_paper_citations: getPaperCitations,
  get_citation_network: getCitationNetwork,
  search_authors: searchAuthors,
  get_author_papers: getAuthorPapers,
  get_trending_papers: getTrendingPapers,
  get_top_keywords: getTopKeywords,
};

export const tools: ToolDefinition[] = Object.values(TOOL_REGISTRY);
