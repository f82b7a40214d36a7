/**
 * Provider-neutral text generation.
 *
 * Callers name a model; the provider follows from the name. Every failure
 * (missing key, SDK error, deadline) surfaces as a GenerationFailureError so
 * the Response Integrator has one thing to catch.
 */

import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { LLM_MODELS, GEMINI_MODELS, CLAUDE_MODELS } from "../config/models";
import { GenerationFailureError, getErrorMessage } from "../utils/errorHandler";

export type Provider = "openai" | "gemini" | "claude";

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

function requireKey(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`${name} is not set`);
  return value;
}

let _openai: OpenAI | null = null;
export function getOpenAI(): OpenAI {
  if (!_openai) {
    // OPENAI_BASE_URL points the SDK at any OpenAI-compatible host
    _openai = new OpenAI({ apiKey: requireKey("OPENAI_API_KEY"), baseURL: process.env.OPENAI_BASE_URL || undefined });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
function getGemini(): GoogleGenAI {
  if (!_gemini) {
    _gemini = new GoogleGenAI({ apiKey: requireKey("GEMINI_API_KEY") });
  }
  return _gemini;
}

// Loaded on first use so deployments without Claude never pull the SDK in
let _claude: InstanceType<typeof import("@anthropic-ai/sdk").default> | null = null;
async function getClaude() {
  if (!_claude) {
    const apiKey = requireKey("ANTHROPIC_API_KEY");
    const Anthropic = (await import("@anthropic-ai/sdk")).default;
    _claude = new Anthropic({ apiKey });
  }
  return _claude;
}

const KNOWN_MODELS: ReadonlyArray<[Provider, ReadonlySet<string>]> = [
  ["openai", new Set<string>(Object.values(LLM_MODELS))],
  ["gemini", new Set<string>(Object.values(GEMINI_MODELS))],
  ["claude", new Set<string>(Object.values(CLAUDE_MODELS))],
];

const MODEL_PREFIXES: ReadonlyArray<[Provider, string]> = [
  ["openai", "gpt-"],
  ["openai", "o1"],
  ["openai", "o3"],
  ["gemini", "gemini-"],
  ["claude", "claude-"],
];

export function detectProvider(model: string): Provider {
  for (const [provider, models] of KNOWN_MODELS) {
    if (models.has(model)) return provider;
  }
  for (const [provider, prefix] of MODEL_PREFIXES) {
    if (model.startsWith(prefix)) return provider;
  }
  // Hosted open models are served through an OpenAI-compatible endpoint
  if (process.env.OPENAI_BASE_URL) return "openai";
  throw new Error(`[LLM Client] Unknown model "${model}": add it to server/config/models.ts or set OPENAI_BASE_URL`);
}

function splitSystem(messages: LLMMessage[]): { system: string; turns: Array<{ role: "user" | "assistant"; content: string }> } {
  const system: string[] = [];
  const turns: Array<{ role: "user" | "assistant"; content: string }> = [];
  for (const m of messages) {
    if (m.role === "system") system.push(m.content);
    else turns.push({ role: m.role, content: m.content });
  }
  return { system: system.join("\n\n"), turns };
}

async function callOpenAI(opts: LLMRequestOptions): Promise<string> {
  const response = await getOpenAI().chat.completions.create({
    model: opts.model,
    messages: opts.messages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
    ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
  });
  return response.choices[0]?.message?.content || "";
}

async function callGemini(opts: LLMRequestOptions): Promise<string> {
  const { system, turns } = splitSystem(opts.messages);
  const response = await getGemini().models.generateContent({
    model: opts.model,
    config: {
      ...(system && { systemInstruction: system }),
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
    },
    contents: turns.map(t => ({
      role: t.role === "assistant" ? "model" : "user",
      parts: [{ text: t.content }],
    })),
  });
  return response.text || "";
}

async function callClaude(opts: LLMRequestOptions): Promise<string> {
  const client = await getClaude();
  const { system, turns } = splitSystem(opts.messages);
  const response = await client.messages.create({
    model: opts.model,
    max_tokens: opts.maxTokens ?? 1024,
    ...(system && { system }),
    messages: turns,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
  });
  const textBlock = response.content.find(b => b.type === "text");
  return textBlock?.type === "text" ? textBlock.text : "";
}

const ADAPTERS: Record<Provider, (opts: LLMRequestOptions) => Promise<string>> = {
  openai: callOpenAI,
  gemini: callGemini,
  claude: callClaude,
};

function withDeadline<T>(work: Promise<T>, timeoutMs: number | undefined, model: string): Promise<T> {
  if (timeoutMs === undefined) return work;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new GenerationFailureError(`[LLM Client] ${model} did not respond within ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

export async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
  const provider = detectProvider(opts.model);
  try {
    const text = await withDeadline(ADAPTERS[provider](opts), opts.timeoutMs, opts.model);
    return { text, provider, model: opts.model };
  } catch (error) {
    if (error instanceof GenerationFailureError) throw error;
    throw new GenerationFailureError(`[LLM Client] ${provider} ${opts.model}: ${getErrorMessage(error)}`);
  }
}
