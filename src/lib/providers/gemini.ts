import { ApiError, GoogleGenAI } from "@google/genai";
import { ProviderError, ProviderTimeoutError } from "../errors";
import { BaseAdapter, errorMessage } from "./base";
import { ProviderSettings } from "./types";

const TIMEOUT_ERROR_NAMES = new Set(["AbortError", "TimeoutError"]);

/**
 * Gemini via models.generateContent
 */
export class GeminiAdapter extends BaseAdapter {
  readonly name = "gemini";

  constructor(
    private readonly client: GoogleGenAI,
    model: string,
    settings: ProviderSettings
  ) {
    super(model, settings);
  }

  protected async complete(prompt: string): Promise<string | undefined> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        ...(this.settings.systemInstruction ? { systemInstruction: this.settings.systemInstruction } : {}),
        httpOptions: { timeout: this.settings.timeoutMs },
      },
    });
    return response.text;
  }

  protected toProviderError(error: unknown): ProviderError {
    if (error instanceof ApiError) {
      return new ProviderError(this.name, `API error (${error.status}): ${error.message}`, {
        cause: error,
        status: error.status,
      });
    }
    if (error instanceof Error && TIMEOUT_ERROR_NAMES.has(error.name)) {
      return new ProviderTimeoutError(this.name, `Request timed out after ${this.settings.timeoutMs}ms`, {
        cause: error,
      });
    }
    return new ProviderError(this.name, errorMessage(error), { cause: error });
  }
}
