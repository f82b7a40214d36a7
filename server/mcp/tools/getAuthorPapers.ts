import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getAuthorPapers: ToolDefinition = {
  name: "get_author_papers",
  description: "List papers written by an author.",
  inputSchema: z.object({
    author_id: z.string().trim().min(1),
    limit: z.number().int().min(1).max(50),
  }),
};
