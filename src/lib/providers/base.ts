import { ProviderError } from "../errors";
import { ProviderAdapter, ProviderSettings } from "./types";

export type PromptPurpose = "statement" | "function" | "freeform";

/**
 * Shared transport plumbing. Subclasses only make the SDK call and map its errors.
 */
export abstract class BaseAdapter implements ProviderAdapter {
  abstract readonly name: string;

  constructor(
    readonly model: string,
    protected readonly settings: ProviderSettings
  ) {}

  sendStatementPrompt(prompt: string): Promise<string> {
    return this.send(prompt, "statement");
  }

  sendFunctionPrompt(prompt: string): Promise<string> {
    return this.send(prompt, "function");
  }

  sendFreeformPrompt(prompt: string): Promise<string> {
    return this.send(prompt, "freeform");
  }

  protected abstract complete(prompt: string): Promise<string | undefined>;

  protected abstract toProviderError(error: unknown): ProviderError;

  private async send(prompt: string, purpose: PromptPurpose): Promise<string> {
    const context = { phase: "provider", component: this.name };
    this.settings.logger.debug(`Sending ${purpose} prompt`, { model: this.model, characters: prompt.length }, context);

    let text: string | undefined;
    try {
      text = await this.complete(prompt);
    } catch (error) {
      const converted = error instanceof ProviderError ? error : this.toProviderError(error);
      this.settings.logger.debug("Request failed", { reason: converted.message }, context);
      throw converted;
    }

    if (!text || text.trim() === "") {
      throw new ProviderError(this.name, "Empty response from model");
    }
    return text;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
