/**
 * Shared types for the reasoning layer: LLM providers and the requests the
 * RCA stages send to them.
 */

/**
 * Core message structure
 */
export interface AgentMessage {
  role: "user" | "assistant";
  content: string;
  timestamp?: number;
}

/**
 * Model selection and sampling for a single call
 */
export interface ModelPreferences {
  providerId?: string; // "claude" | "openai" | "gemini"
  model?: string; // Specific model name
  temperature?: number; // 0-1
  maxTokens?: number;
}

/**
 * One non-streaming completion request
 */
export interface CompletionRequest {
  systemPrompt?: string;
  messages: AgentMessage[];
  modelPreferences?: ModelPreferences;
}

/**
 * LLM provider configuration and the single call the RCA stages need
 */
export interface LLMProvider {
  id: string; // "claude" | "openai" | "gemini"
  name: string;

  // Model capabilities
  supportedModels: string[];
  defaultModel: string;
  contextWindowSize: number;

  // API configuration
  apiKeyRequired: boolean;

  // Priority when no provider is pinned for a stage
  priority?: number;

  complete(request: CompletionRequest): Promise<string>;
}

/**
 * The RCA stages an LLM call can be made for
 */
export type ReasoningStage = "detector" | "analyst" | "validator";

/**
 * Error from the reasoning layer
 */
export class AgentError extends Error {
  constructor(
    public code: string,
    message: string,
    public retryable: boolean = false,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "AgentError";
  }
}
