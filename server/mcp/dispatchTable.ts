/**
 * Intent → tool invocation plans.
 *
 * One entry per IntentType; DispatchTable is a mapped type, so a new intent
 * without a plan does not compile. Steps in the same stage are independent.
 * A step in a later stage may read identifiers from an earlier stage's
 * result; when that result has none, the step resolves to a dependency
 * failure instead of a call.
 *
 * Layer: MCP (dispatch)
 */

import { TOOL_DEFAULTS } from "../config/constants";
import type { ArgsOutcome, DispatchTable, EarlierResults } from "./types";
import { decodePayload, readAuthors, readPaper } from "./payloads";

function firstAuthorId(earlier: EarlierResults): ArgsOutcome {
  const result = earlier.get("search_authors");
  if (!result || result.status !== "ok") {
    return { ok: false, reason: "search_authors did not succeed" };
  }
  const author = readAuthors(decodePayload(result)).find(a => a.id !== undefined);
  return author?.id
    ? { ok: true, args: { author_id: author.id } }
    : { ok: false, reason: "search_authors returned no author id" };
}

function resolvedPaperId(paperId: string | undefined, earlier: EarlierResults): ArgsOutcome {
  if (paperId) return { ok: true, args: { paper_id: paperId } };
  const result = earlier.get("get_paper_details");
  if (!result || result.status !== "ok") {
    return { ok: false, reason: "get_paper_details did not succeed" };
  }
  const paper = readPaper(decodePayload(result));
  return paper?.id
    ? { ok: true, args: { paper_id: paper.id } }
    : { ok: false, reason: "get_paper_details returned no paper id" };
}

export const DISPATCH_TABLE: DispatchTable = {
  search_papers: {
    stages: [[
      {
        tool: "search_papers",
        buildArgs: p => ({
          ok: true,
          args: {
            query: p.keywords.join(" "),
            limit: p.limit,
            ...(p.yearFrom !== undefined ? { year_from: p.yearFrom } : {}),
            ...(p.yearTo !== undefined ? { year_to: p.yearTo } : {}),
          },
        }),
      },
    ]],
  },

  author_info: {
    stages: [
      [{ tool: "search_authors", buildArgs: p => ({ ok: true, args: { query: p.authorName, limit: p.limit } }) }],
      [{
        tool: "get_author_papers",
        buildArgs: (p, earlier) => {
          const id = firstAuthorId(earlier);
          return id.ok ? { ok: true, args: { ...id.args, limit: p.limit } } : id;
        },
      }],
    ],
  },

  citation_analysis: {
    stages: [
      [{
        tool: "get_paper_details",
        buildArgs: p => ({
          ok: true,
          args: p.paperId ? { paper_id: p.paperId } : { title: p.paperTitle },
        }),
      }],
      [
        { tool: "get_paper_citations", buildArgs: (p, earlier) => resolvedPaperId(p.paperId, earlier) },
        {
          tool: "get_citation_network",
          buildArgs: (p, earlier) => {
            const id = resolvedPaperId(p.paperId, earlier);
            return id.ok ? { ok: true, args: { ...id.args, depth: p.depth } } : id;
          },
        },
      ],
    ],
  },

  trend_analysis: {
    stages: [[
      {
        tool: "get_trending_papers",
        buildArgs: p => ({
          ok: true,
          args: { ...(p.field ? { field: p.field } : {}), time_range: p.timeRange },
        }),
      },
      {
        tool: "get_top_keywords",
        buildArgs: p => ({
          ok: true,
          args: { ...(p.field ? { field: p.field } : {}), limit: TOOL_DEFAULTS.KEYWORD_LIMIT },
        }),
      },
    ]],
  },

  keyword_analysis: {
    stages: [[
      {
        tool: "get_top_keywords",
        buildArgs: p => ({
          ok: true,
          args: { ...(p.field ? { field: p.field } : {}), limit: p.limit },
        }),
      },
    ]],
  },

  // Nothing to look up; the integrator asks for clarification
  unknown: { stages: [] },
};
