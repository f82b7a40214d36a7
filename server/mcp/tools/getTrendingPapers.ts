/**
 * Get Trending Papers Tool
 *
 * Purpose:
 * Most popular recent papers, optionally within a field. Time ranges use
 * the data service's compact form ("1year", "6months").
 *
 * Layer: MCP Tool
 */

import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getTrendingPapers: ToolDefinition = {
  name: "get_trending_papers",
  description: "Trending papers, optionally within a field and time range.",
  inputSchema: z.object({
    field: z.string().trim().min(1).optional(),
    time_range: z.string().regex(/^\d+(?:year|month|week)s?$/, "Expected a range like 1year or 6months"),
  }),
};
