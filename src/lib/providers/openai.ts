import OpenAI from "openai";
import { ProviderError, ProviderTimeoutError } from "../errors";
import { BaseAdapter, errorMessage } from "./base";
import { ProviderSettings } from "./types";

/**
 * OpenAI Responses API. SDK-level retries are off; attempts belong to the
 * retry controller.
 */
export class OpenAIAdapter extends BaseAdapter {
  readonly name = "openai";

  constructor(
    private readonly client: OpenAI,
    model: string,
    settings: ProviderSettings
  ) {
    super(model, settings);
  }

  protected async complete(prompt: string): Promise<string | undefined> {
    const response = await this.client.responses.create(
      {
        model: this.model,
        input: prompt,
        ...(this.settings.systemInstruction ? { instructions: this.settings.systemInstruction } : {}),
      },
      { timeout: this.settings.timeoutMs, maxRetries: 0 }
    );
    return response.output_text;
  }

  protected toProviderError(error: unknown): ProviderError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderTimeoutError(this.name, `Request timed out after ${this.settings.timeoutMs}ms`, {
        cause: error,
      });
    }
    if (error instanceof OpenAI.APIError) {
      return new ProviderError(this.name, `API error (${error.status ?? "no status"}): ${error.message}`, {
        cause: error,
        status: error.status,
      });
    }
    return new ProviderError(this.name, errorMessage(error), { cause: error });
  }
}
