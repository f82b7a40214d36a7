/**
 * Get Paper Details Tool
 *
 * Purpose:
 * Looks up one paper by identifier or title. Citation analysis uses the
 * returned paper id for its follow-up calls.
 *
 * Layer: MCP Tool
 */

import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getPaperDetails: ToolDefinition = {
  name: "get_paper_details",
  description: "Get details of a paper by id or title.",
  inputSchema: z.object({
    paper_id: z.string().trim().min(1).optional(),
    title: z.string().trim().min(1).optional(),
  }).refine(args => args.paper_id !== undefined || args.title !== undefined, {
    message: "paper_id or title is required",
  }),
};
