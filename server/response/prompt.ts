/**
 * Prompt synthesis for the Response Integrator.
 *
 * buildResponsePrompt is a pure function of its input. Nothing time- or
 * id-dependent (timestamps, correlation ids, processing time) goes into it,
 * so identical inputs always yield an identical prompt.
 */

import type { ConversationTurn } from "@shared/schema";
import { RESPONSE_CONSTANTS } from "../config/constants";
import {
  RESEARCH_RESPONSE_SYSTEM_PROMPT,
  STRATEGY_INSTRUCTIONS,
  type ResponseStrategy,
} from "../config/prompts";
import type { LLMMessage } from "../llm/client";
import type { Author, Paper } from "../mcp/payloads";
import type { ResearchData, ResearchInsights } from "./normalize";

export type PromptInput = {
  question: string;
  strategy: ResponseStrategy;
  data: ResearchData;
  insights: ResearchInsights;
  unavailable: string[];
  clarificationQuestions: string[];
  recentTurns: ConversationTurn[];
};

function preview(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const limit = RESPONSE_CONSTANTS.ABSTRACT_PREVIEW_CHARS;
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function formatPaper(paper: Paper, index: number): string {
  const lines = [`${index}. "${paper.title}"`];
  if (paper.authors.length > 0) lines.push(`   Authors: ${paper.authors.slice(0, 5).join(", ")}`);
  const venue = [paper.venue, paper.year].filter(v => v !== undefined).join(", ");
  if (venue) lines.push(`   Published: ${venue}`);
  if (paper.citations !== undefined) lines.push(`   Citations: ${paper.citations}`);
  if (paper.keywords.length > 0) lines.push(`   Keywords: ${paper.keywords.slice(0, 5).join(", ")}`);
  const abstract = preview(paper.abstract);
  if (abstract) lines.push(`   Abstract: ${abstract}`);
  return lines.join("\n");
}

function formatAuthor(author: Author): string {
  const lines = [`Name: ${author.name}`];
  if (author.affiliation) lines.push(`Affiliation: ${author.affiliation}`);
  if (author.paperCount !== undefined) lines.push(`Papers: ${author.paperCount}`);
  if (author.citationCount !== undefined) lines.push(`Citations: ${author.citationCount}`);
  if (author.hIndex !== undefined) lines.push(`H-index: ${author.hIndex}`);
  if (author.researchInterests.length > 0) lines.push(`Research interests: ${author.researchInterests.join(", ")}`);
  if (author.coauthors.length > 0) {
    const top = [...author.coauthors]
      .sort((a, b) => (b.collaborationCount ?? 0) - (a.collaborationCount ?? 0))
      .slice(0, 5)
      .map(c => c.name);
    lines.push(`Frequent co-authors: ${top.join(", ")}`);
  }
  return lines.join("\n");
}

function paperSection(heading: string, papers: Paper[]): string {
  const shown = papers.slice(0, RESPONSE_CONSTANTS.MAX_ITEMS_IN_PROMPT);
  const more = papers.length > shown.length ? `\n(${papers.length - shown.length} more not shown)` : "";
  return `${heading} (${papers.length}):\n${shown.map((p, i) => formatPaper(p, i + 1)).join("\n")}${more}`;
}

function formatData(data: ResearchData): string[] {
  switch (data.kind) {
    case "papers":
      return data.papers.length > 0 ? [paperSection("Papers found", data.papers)] : ["No papers were found."];
    case "author": {
      const sections: string[] = [];
      const [primary, ...others] = data.authors;
      if (primary) sections.push(`Author profile:\n${formatAuthor(primary)}`);
      if (others.length > 0) sections.push(`Other matching authors: ${others.slice(0, 4).map(a => a.name).join(", ")}`);
      if (data.papers.length > 0) sections.push(paperSection("Papers by this author", data.papers));
      return sections.length > 0 ? sections : ["No matching author was found."];
    }
    case "citations": {
      const sections: string[] = [];
      if (data.paper) sections.push(`Paper analyzed:\n${formatPaper(data.paper, 1)}`);
      if (data.citingPapers.length > 0) sections.push(paperSection("Citing papers", data.citingPapers));
      if (data.network) {
        sections.push(`Citation network: ${data.network.nodes.length} papers, ${data.network.edges.length} citation links`);
      }
      return sections.length > 0 ? sections : ["No citation data was found."];
    }
    case "trends": {
      const sections: string[] = [];
      if (data.timeWindow) sections.push(`Time window: ${data.timeWindow}`);
      if (data.papers.length > 0) sections.push(paperSection("Trending papers", data.papers));
      if (data.keywords.length > 0) {
        sections.push(`Frequent keywords: ${data.keywords.slice(0, 10).map(k => `${k.keyword} (${k.paperCount})`).join(", ")}`);
      }
      return sections.length > 0 ? sections : ["No trend data was found."];
    }
    case "keywords":
      return data.keywords.length > 0
        ? [`Top keywords:\n${data.keywords.map((k, i) => `${i + 1}. ${k.keyword}: ${k.paperCount} papers`).join("\n")}`]
        : ["No keyword data was found."];
    case "none":
      return [];
  }
}

function formatTurns(turns: ConversationTurn[]): string | undefined {
  if (turns.length === 0) return undefined;
  return `Recent conversation:\n${turns.map(t => `${t.role}: ${t.content.slice(0, 200)}`).join("\n")}`;
}

export function buildResponsePrompt(input: PromptInput): LLMMessage[] {
  const sections: string[] = [];

  const turns = formatTurns(input.recentTurns);
  if (turns) sections.push(turns);

  sections.push(`User question: ${input.question}`);
  sections.push(...formatData(input.data));

  const insightLines = Object.entries(input.insights).map(([key, value]) => `- ${key}: ${value}`);
  if (insightLines.length > 0) sections.push(`Derived insights:\n${insightLines.join("\n")}`);

  if (input.unavailable.length > 0) {
    sections.push(`Unavailable data: ${input.unavailable.join(", ")}`);
  }
  if (input.clarificationQuestions.length > 0) {
    sections.push(`Clarification to offer:\n${input.clarificationQuestions.join("\n")}`);
  }

  return [
    { role: "system", content: `${RESEARCH_RESPONSE_SYSTEM_PROMPT}\n\n${STRATEGY_INSTRUCTIONS[input.strategy]}` },
    { role: "user", content: sections.join("\n\n") },
  ];
}
