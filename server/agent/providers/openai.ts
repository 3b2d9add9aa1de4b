import OpenAI from "openai";
import {
  LLMProvider,
  AgentMessage,
  AgentError,
  CompletionRequest,
} from "@shared/coordination";
import { withRetries } from "./retry";

/**
 * OpenAI Provider implementing LLMProvider interface over Chat Completions
 */
export class OpenAIProvider implements LLMProvider {
  id = "openai";
  name = "OpenAI";

  supportedModels = [
    "gpt-4.1",
    "gpt-4.1-mini",
    "gpt-4o",
    "gpt-4o-mini",
  ];
  defaultModel = "gpt-4.1";
  contextWindowSize = 128000;

  apiKeyRequired = true;
  priority = 2;

  private client: OpenAI;

  constructor(apiKey?: string) {
    const key = apiKey || process.env.OPENAI_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "OPENAI_API_KEY is required for OpenAI provider",
        false
      );
    }
    this.client = new OpenAI({ apiKey: key });
  }

  /**
   * Convert internal messages to OpenAI's expected format
   */
  private formatMessagesForOpenAI(
    systemPrompt: string | undefined,
    messages: AgentMessage[]
  ): OpenAI.ChatCompletionMessageParam[] {
    const formatted: OpenAI.ChatCompletionMessageParam[] = systemPrompt
      ? [{ role: "system", content: systemPrompt }]
      : [];

    for (const msg of messages) {
      formatted.push({ role: msg.role, content: msg.content });
    }

    return formatted;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { systemPrompt, messages, modelPreferences } = request;

    const completion = await withRetries(this.name, () =>
      this.client.chat.completions.create({
        model: modelPreferences?.model || this.defaultModel,
        max_completion_tokens: modelPreferences?.maxTokens || 4096,
        temperature: modelPreferences?.temperature ?? 0.2,
        messages: this.formatMessagesForOpenAI(systemPrompt, messages),
      }),
    );

    return completion.choices[0]?.message?.content ?? "";
  }
}
