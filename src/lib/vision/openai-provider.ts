import OpenAI from "openai";
import { ANALYSIS_PROMPT, parseAnalysisJson, type VisionProvider } from "./analysis";

interface ProviderEndpoint {
  keyEnv: string;
  defaultModel: string;
  /** Omitted for OpenAI itself */
  baseURL?: string;
}

/** Every provider is reached through its OpenAI-compatible chat endpoint. */
export const VISION_PROVIDERS = {
  openai: { keyEnv: "OPENAI_API_KEY", defaultModel: "gpt-4o" },
  anthropic: {
    keyEnv: "ANTHROPIC_API_KEY",
    defaultModel: "claude-3-5-sonnet-20241022",
    baseURL: "https://api.anthropic.com/v1/",
  },
  gemini: {
    keyEnv: "GOOGLE_API_KEY",
    defaultModel: "gemini-1.5-pro",
    baseURL: "https://generativelanguage.googleapis.com/v1beta/openai/",
  },
} satisfies Record<string, ProviderEndpoint>;

export type VisionProviderName = keyof typeof VISION_PROVIDERS;

export function isVisionProviderName(name: string): name is VisionProviderName {
  return Object.prototype.hasOwnProperty.call(VISION_PROVIDERS, name);
}

const MAX_TOKENS = 4096;
const TEMPERATURE = 0.1;

export class OpenAiCompatibleVisionProvider implements VisionProvider {
  private client: OpenAI | null = null;
  private readonly endpoint: ProviderEndpoint;
  readonly model: string;

  constructor(
    readonly name: VisionProviderName,
    model: string | undefined,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.endpoint = VISION_PROVIDERS[name];
    this.model = model || this.endpoint.defaultModel;
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    const apiKey = this.env[this.endpoint.keyEnv];
    if (!apiKey) {
      throw new Error(`No API key for ${this.name}. Set ${this.endpoint.keyEnv}.`);
    }
    this.client = new OpenAI({ apiKey, baseURL: this.endpoint.baseURL });
    return this.client;
  }

  async analyze(image: Buffer, mimeType: string): Promise<Record<string, unknown>> {
    const response = await this.getClient().chat.completions.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: ANALYSIS_PROMPT },
            {
              type: "image_url",
              image_url: {
                url: `data:${mimeType};base64,${image.toString("base64")}`,
                detail: "high",
              },
            },
          ],
        },
      ],
    });
    const text = response.choices[0]?.message.content;
    if (!text) {
      throw new Error(`${this.name} returned an empty response`);
    }
    return parseAnalysisJson(text);
  }
}

export interface VisionSettings {
  enabled: boolean;
  provider: string;
  model?: string;
}

/** Returns null while vision analysis is switched off. */
export function createVisionProvider(
  settings: VisionSettings,
  env: NodeJS.ProcessEnv = process.env,
): VisionProvider | null {
  if (!settings.enabled) return null;
  if (!isVisionProviderName(settings.provider)) {
    throw new Error(
      `Unknown vision provider "${settings.provider}". Choose one of: ${Object.keys(VISION_PROVIDERS).join(", ")}`,
    );
  }
  return new OpenAiCompatibleVisionProvider(settings.provider, settings.model, env);
}
