/**
 * Search Authors Tool
 *
 * Purpose:
 * Finds researchers by name. The first match's id feeds get_author_papers.
 *
 * Layer: MCP Tool
 */

import { z } from "zod";
import type { ToolDefinition } from "../types";

export const searchAuthors: ToolDefinition = {
  name: "search_authors",
  description: "Search authors by name.",
  inputSchema: z.object({
    query: z.string().trim().min(1),
    limit: z.number().int().min(1).max(50),
  }),
};
