import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getTopKeywords: ToolDefinition = {
  name: "get_top_keywords",
  description: "Most frequent keywords, optionally within a field.",
  inputSchema: z.object({
    field: z.string().trim().min(1).optional(),
    limit: z.number().int().min(1).max(100),
  }),
};
