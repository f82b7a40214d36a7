/**
 * Search Papers Tool
 *
 * Purpose:
 * Keyword search over the paper index, optionally bounded by publication year.
 *
 * Layer: MCP Tool
 */

import { z } from "zod";
import type { ToolDefinition } from "../types";

export const searchPapers: ToolDefinition = {
  name: "search_papers",
  description: "Search papers by keywords.",
  inputSchema: z.object({
    query: z.string().trim().min(1),
    limit: z.number().int().min(1).max(50),
    year_from: z.number().int().optional(),
    year_to: z.number().int().optional(),
  }).refine(
    args => args.year_from === undefined || args.year_to === undefined || args.year_from <= args.year_to,
    { message: "year_from must not be after year_to" },
  ),
};
