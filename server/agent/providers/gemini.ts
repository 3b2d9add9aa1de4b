import { GoogleGenerativeAI, Content } from "@google/generative-ai";
import {
  LLMProvider,
  AgentMessage,
  AgentError,
  CompletionRequest,
} from "@shared/coordination";
import { withRetries } from "./retry";

/**
 * Gemini Provider implementing LLMProvider interface
 */
export class GeminiProvider implements LLMProvider {
  id = "gemini";
  name = "Gemini (Google)";

  supportedModels = ["gemini-2.5-flash", "gemini-2.5-pro", "gemini-2.0-flash"];
  defaultModel = "gemini-2.5-flash";
  contextWindowSize = 1000000;

  apiKeyRequired = true;
  priority = 3;

  private client: GoogleGenerativeAI;

  constructor(apiKey?: string) {
    const key = apiKey || process.env.GOOGLE_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "GOOGLE_API_KEY is required for Gemini provider",
        false
      );
    }
    this.client = new GoogleGenerativeAI(key);
  }

  /**
   * Gemini names the assistant role "model"
   */
  private formatMessagesForGemini(messages: AgentMessage[]): Content[] {
    return messages.map((msg) => ({
      role: msg.role === "assistant" ? "model" : "user",
      parts: [{ text: msg.content }],
    }));
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { systemPrompt, messages, modelPreferences } = request;

    const model = this.client.getGenerativeModel({
      model: modelPreferences?.model || this.defaultModel,
      systemInstruction: systemPrompt,
      generationConfig: {
        temperature: modelPreferences?.temperature ?? 0.2,
        maxOutputTokens: modelPreferences?.maxTokens || 4096,
      },
    });

    const result = await withRetries(this.name, () =>
      model.generateContent({ contents: this.formatMessagesForGemini(messages) }),
    );

    return result.response.text();
  }
}
