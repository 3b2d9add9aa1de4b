/**
 * LLM Providers Index
 *
 * Re-exports all provider implementations and builds the set of providers
 * that have credentials.
 */

export { ClaudeProvider } from "./claude";
export { OpenAIProvider } from "./openai";
export { GeminiProvider } from "./gemini";

import { LLMProvider } from "@shared/coordination";
import { ClaudeProvider } from "./claude";
import { OpenAIProvider } from "./openai";
import { GeminiProvider } from "./gemini";

/**
 * Provider configuration for initialization
 */
export interface ProviderConfig {
  claudeApiKey?: string;
  openaiApiKey?: string;
  geminiApiKey?: string;
}

/**
 * Create all providers that have credentials, from explicit config or env.
 */
export function createConfiguredProviders(
  config: ProviderConfig = {}
): Map<string, LLMProvider> {
  const providers = new Map<string, LLMProvider>();

  const claudeApiKey = config.claudeApiKey || process.env.ANTHROPIC_API_KEY;
  if (claudeApiKey) {
    try {
      providers.set("claude", new ClaudeProvider(claudeApiKey));
    } catch (error) {
      console.warn("Failed to initialize Claude provider:", error);
    }
  }

  const openaiKey = config.openaiApiKey || process.env.OPENAI_API_KEY;
  if (openaiKey) {
    try {
      providers.set("openai", new OpenAIProvider(openaiKey));
    } catch (error) {
      console.warn("Failed to initialize OpenAI provider:", error);
    }
  }

  const geminiKey = config.geminiApiKey || process.env.GOOGLE_API_KEY;
  if (geminiKey) {
    try {
      providers.set("gemini", new GeminiProvider(geminiKey));
    } catch (error) {
      console.warn("Failed to initialize Gemini provider:", error);
    }
  }

  return providers;
}
