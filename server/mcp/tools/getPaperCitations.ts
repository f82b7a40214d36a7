import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getPaperCitations: ToolDefinition = {
  name: "get_paper_citations",
  description: "List papers citing a given paper.",
  inputSchema: z.object({
    paper_id: z.string().trim().min(1),
  }),
};
