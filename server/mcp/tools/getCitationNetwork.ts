import { z } from "zod";
import type { ToolDefinition } from "../types";

export const getCitationNetwork: ToolDefinition = {
  name: "get_citation_network",
  description: "Citation graph around a paper, up to the given depth.",
  inputSchema: z.object({
    paper_id: z.string().trim().min(1),
    depth: z.number().int().min(1).max(3),
  }),
};
