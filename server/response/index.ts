export {
  ResponseIntegrator,
  createLanguageModel,
  type GenerationConfig,
  type IntegratedResponse,
  type IntegrationContext,
  type LanguageModel,
  type ResponseIntegratorOptions,
  type ResponseMetadata,
} from "./integrator";
export { normalizeResults, deriveInsights, type ResearchData, type ResearchInsights } from "./normalize";
export { buildResponsePrompt, type PromptInput } from "./prompt";
export { buildFallbackMessage } from "./fallback";
