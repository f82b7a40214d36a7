import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadSettings } from '../config/settings';
import { MODEL_ASSIGNMENTS } from '../config/models';

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSettings({});

    expect(settings.port).toBe(5000);
    expect(settings.databaseUrl).toBeUndefined();
    expect(settings.dataService).toEqual({
      command: 'research-data-service',
      args: [],
      cwd: path.resolve('.'),
      startupTimeoutMs: 45000,
      callTimeoutMs: 60000,
      maxRetries: 3,
      retryDelayMs: 1000,
      maxConsecutiveTimeouts: 3,
      debugLog: false,
      debugLogFile: undefined,
    });
    expect(settings.llm.model).toBe(MODEL_ASSIGNMENTS.RESEARCH_RESPONSE);
    expect(settings.intent).toEqual({ threshold: 0.5, llmFallback: false, contextWindow: 6 });
  });

  it('parses overrides from strings', () => {
    const settings = loadSettings({
      PORT: '8080',
      MCP_SERVER_COMMAND: 'node',
      MCP_SERVER_ARGS: '["dist/server.js", "--stdio"]',
      MCP_CALL_TIMEOUT_MS: '1500',
      MCP_ENABLE_DEBUG_LOG: 'yes',
      INTENT_LLM_FALLBACK: '1',
      INTENT_CONFIDENCE_THRESHOLD: '0.65',
      CONTEXT_WINDOW_TURNS: '0',
      LLM_TEMPERATURE: '0.2',
    });

    expect(settings.port).toBe(8080);
    expect(settings.dataService.command).toBe('node');
    expect(settings.dataService.args).toEqual(['dist/server.js', '--stdio']);
    expect(settings.dataService.callTimeoutMs).toBe(1500);
    expect(settings.dataService.debugLog).toBe(true);
    expect(settings.intent).toEqual({ threshold: 0.65, llmFallback: true, contextWindow: 0 });
    expect(settings.llm.temperature).toBe(0.2);
  });

  it('rejects malformed values', () => {
    expect(() => loadSettings({ MCP_SERVER_ARGS: 'dist/server.js' })).toThrow('[Settings] Invalid environment');
    expect(() => loadSettings({ INTENT_CONFIDENCE_THRESHOLD: '1.5' })).toThrow('[Settings] Invalid environment');
    expect(() => loadSettings({ MCP_ENABLE_DEBUG_LOG: 'maybe' })).toThrow('[Settings] Invalid environment');
  });
});
