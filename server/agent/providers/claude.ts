import Anthropic from "@anthropic-ai/sdk";
import {
  LLMProvider,
  AgentMessage,
  AgentError,
  CompletionRequest,
} from "@shared/coordination";
import { withRetries } from "./retry";

/**
 * Claude Provider implementing LLMProvider interface
 *
 * Single-shot completions over the Messages API. The system prompt is sent
 * as a cached block since the RCA stages reuse it across pods.
 */
export class ClaudeProvider implements LLMProvider {
  id = "claude";
  name = "Claude (Anthropic)";

  supportedModels = [
    "claude-sonnet-4-5-20250929",
    "claude-opus-4-1-20250805",
    "claude-sonnet-4-20250514",
    "claude-3-5-haiku-20241022",
  ];
  defaultModel = "claude-sonnet-4-5-20250929";
  contextWindowSize = 200000;

  apiKeyRequired = true;
  priority = 1;

  private client: Anthropic;

  constructor(apiKey?: string) {
    const key = apiKey || process.env.ANTHROPIC_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "ANTHROPIC_API_KEY is required for Claude provider",
        false
      );
    }
    this.client = new Anthropic({ apiKey: key });
  }

  /**
   * Convert internal messages to Claude's expected format
   */
  private formatMessagesForClaude(
    messages: AgentMessage[]
  ): Anthropic.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { systemPrompt, messages, modelPreferences } = request;

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: modelPreferences?.model || this.defaultModel,
      max_tokens: modelPreferences?.maxTokens || 4096,
      temperature: modelPreferences?.temperature ?? 0.2,
      messages: this.formatMessagesForClaude(messages),
    };

    if (systemPrompt) {
      params.system = [
        { type: "text", text: systemPrompt, cache_control: { type: "ephemeral" } },
      ];
    }

    const message = await withRetries(this.name, () => this.client.messages.create(params));

    return message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
  }
}
