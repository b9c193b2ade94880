/**
 * Adapter selection by client shape
 */

import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import { UnsupportedClientError } from "../errors";
import { GeminiAdapter } from "./gemini";
import { OpenAIAdapter } from "./openai";
import { ProviderAdapter, ProviderSettings } from "./types";

export interface ProviderEntry {
  readonly name: string;
  /** An adapter when this entry recognizes `client`, else undefined */
  build(client: unknown, model: string, settings: ProviderSettings): ProviderAdapter | undefined;
}

export function defineProvider<C>(
  name: string,
  recognizes: (client: unknown) => client is C,
  create: (client: C, model: string, settings: ProviderSettings) => ProviderAdapter
): ProviderEntry {
  return {
    name,
    build(client, model, settings) {
      return recognizes(client) ? create(client, model, settings) : undefined;
    },
  };
}

export const openaiProvider = defineProvider(
  "openai",
  (client): client is OpenAI => client instanceof OpenAI,
  (client, model, settings) => new OpenAIAdapter(client, model, settings)
);

export const geminiProvider = defineProvider(
  "gemini",
  (client): client is GoogleGenAI => client instanceof GoogleGenAI,
  (client, model, settings) => new GeminiAdapter(client, model, settings)
);

export class ProviderRegistry {
  private entries: ProviderEntry[];

  constructor(entries: ProviderEntry[] = []) {
    this.entries = [...entries];
  }

  /**
   * Add an entry. Entries are consulted in registration order.
   */
  register(entry: ProviderEntry): this {
    if (this.entries.some((existing) => existing.name === entry.name)) {
      throw new Error(`Provider "${entry.name}" is already registered`);
    }
    this.entries.push(entry);
    return this;
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  select(client: unknown, model: string, settings: ProviderSettings): ProviderAdapter {
    for (const entry of this.entries) {
      const adapter = entry.build(client, model, settings);
      if (adapter) {
        return adapter;
      }
    }
    throw new UnsupportedClientError(this.names());
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([openaiProvider, geminiProvider]);
}
