import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from './config.js';
import { ProviderError, ProviderTimeoutError, UnsupportedProviderError } from './errors.js';
import { PROVIDER_IDS, type ProviderId, type Vendor } from './types.js';

/**
 * A vendor completion API reduced to the one call the pipeline needs
 */
export interface CompletionProvider {
  readonly vendor: Vendor;
  readonly model: ProviderId;
  generateCompletion(prompt: string): Promise<string>;
}

export type HttpClient = Pick<AxiosInstance, 'post'>;

export interface ProviderOptions {
  apiKey?: string;
  timeoutMs?: number;
  http?: HttpClient;
  maxTokens?: number;
}

const VENDOR_BY_PROVIDER: Record<ProviderId, Vendor> = {
  'claude-sonnet-4-0': 'anthropic',
  'gpt-5.2': 'openai',
  'gemini-3-flash-preview': 'google',
};

const API_KEY_NAMES: Record<Vendor, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GEMINI_API_KEY',
};

// OpenAI and Gemini reasoning tokens count against the same output budget
const DEFAULT_MAX_TOKENS: Record<Vendor, number> = {
  anthropic: 2048,
  openai: 8192,
  google: 8192,
};

/**
 * Text of a completion and whether the vendor stopped it at the token limit
 */
export interface CompletionText {
  text: string;
  truncated: boolean;
}

function isProviderId(value: string): value is ProviderId {
  return (PROVIDER_IDS as readonly string[]).includes(value);
}

/**
 * Validate a caller-supplied model identifier
 */
export function resolveProviderId(value: string | undefined): ProviderId {
  const candidate = (value ?? '').trim();
  if (!isProviderId(candidate)) {
    throw new UnsupportedProviderError(candidate, PROVIDER_IDS);
  }
  return candidate;
}

export function vendorFor(providerId: ProviderId): Vendor {
  return VENDOR_BY_PROVIDER[providerId];
}

/**
 * Shape of the error body all three vendors return
 */
const VendorErrorSchema = z.object({
  error: z.union([
    z.object({ message: z.string() }).passthrough(),
    z.string(),
  ]),
});

function vendorErrorMessage(data: unknown, fallback: string): string {
  const parsed = VendorErrorSchema.safeParse(data);
  if (!parsed.success) {
    return fallback;
  }
  return typeof parsed.data.error === 'string' ? parsed.data.error : parsed.data.error.message;
}

/**
 * Shared request path: one POST, a timeout, and a common error mapping.
 * Subclasses only describe the request body and where the text lives in
 * the response.
 */
abstract class HttpCompletionProvider implements CompletionProvider {
  abstract readonly vendor: Vendor;
  protected readonly apiKey: string | undefined;
  protected readonly timeoutMs: number;
  protected readonly maxTokens: number;
  private readonly http: HttpClient;

  constructor(readonly model: ProviderId, options: ProviderOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? config.PROVIDER_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS[vendorFor(model)];
    this.http = options.http ?? axios;
  }

  protected abstract endpoint(): string;
  protected abstract headers(apiKey: string): Record<string, string>;
  protected abstract body(prompt: string): unknown;
  /** Returns the completion, or null when the body has the wrong shape */
  protected abstract readCompletion(data: unknown): CompletionText | null;

  async generateCompletion(prompt: string): Promise<string> {
    if (!this.apiKey) {
      throw new ProviderError(this.vendor, null, `${API_KEY_NAMES[this.vendor]} is not configured`);
    }

    const startedAt = Date.now();
    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.endpoint(), this.body(prompt), {
        headers: { ...this.headers(this.apiKey), 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw this.mapRequestError(error);
    }

    const completion = this.readCompletion(data);
    if (completion === null) {
      throw new ProviderError(this.vendor, status, 'Unexpected response format');
    }
    if (completion.truncated) {
      throw new ProviderError(this.vendor, status, 'Completion truncated at token limit');
    }
    const { text } = completion;
    if (!text.trim()) {
      throw new ProviderError(this.vendor, status, 'Empty completion');
    }

    console.log(`[${this.vendor}] ${this.model} returned ${text.length} characters in ${Date.now() - startedAt}ms`);
    return text;
  }

  private mapRequestError(error: unknown): Error {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new ProviderTimeoutError(this.vendor, this.timeoutMs, { cause: error });
      }
      if (error.response) {
        const status = error.response.status;
        return new ProviderError(this.vendor, status, vendorErrorMessage(error.response.data, error.message), {
          cause: error,
        });
      }
      return new ProviderError(this.vendor, null, error.message, { cause: error });
    }
    return new ProviderError(this.vendor, null, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
});

export class AnthropicProvider extends HttpCompletionProvider {
  readonly vendor = 'anthropic';

  protected endpoint(): string {
    return 'https://api.anthropic.com/v1/messages';
  }

  protected headers(apiKey: string): Record<string, string> {
    return { 'x-api-key': apiKey, 'anthropic-version': '2023-06-01' };
  }

  protected body(prompt: string): unknown {
    return {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt }],
    };
  }

  protected readCompletion(data: unknown): CompletionText | null {
    const parsed = AnthropicResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    return {
      text: parsed.data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      truncated: parsed.data.stop_reason === 'max_tokens',
    };
  }
}

const OpenAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
});

export class OpenAIProvider extends HttpCompletionProvider {
  readonly vendor = 'openai';

  protected endpoint(): string {
    return 'https://api.openai.com/v1/chat/completions';
  }

  protected headers(apiKey: string): Record<string, string> {
    return { Authorization: `Bearer ${apiKey}` };
  }

  protected body(prompt: string): unknown {
    return {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_completion_tokens: this.maxTokens,
    };
  }

  protected readCompletion(data: unknown): CompletionText | null {
    const parsed = OpenAIResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    const [choice] = parsed.data.choices;
    return { text: choice.message.content ?? '', truncated: choice.finish_reason === 'length' };
  }
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .min(1),
});

export class GeminiProvider extends HttpCompletionProvider {
  readonly vendor = 'google';

  protected endpoint(): string {
    return `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;
  }

  protected headers(apiKey: string): Record<string, string> {
    return { 'x-goog-api-key': apiKey };
  }

  protected body(prompt: string): unknown {
    return {
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { maxOutputTokens: this.maxTokens },
    };
  }

  protected readCompletion(data: unknown): CompletionText | null {
    const parsed = GeminiResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    const [candidate] = parsed.data.candidates;
    const parts = candidate.content?.parts ?? [];
    return {
      text: parts.map((part) => part.text ?? '').join(''),
      truncated: candidate.finishReason === 'MAX_TOKENS',
    };
  }
}

function defaultApiKey(vendor: Vendor): string | undefined {
  switch (vendor) {
    case 'anthropic':
      return config.ANTHROPIC_API_KEY;
    case 'openai':
      return config.OPENAI_API_KEY;
    case 'google':
      return config.GEMINI_API_KEY;
  }
}

/**
 * Create the provider for a validated model identifier. The API key and
 * timeout default to the configured ones.
 */
export function createProvider(providerId: ProviderId, options: ProviderOptions = {}): CompletionProvider {
  const vendor = vendorFor(providerId);
  const resolved: ProviderOptions = { ...options, apiKey: options.apiKey ?? defaultApiKey(vendor) };

  switch (vendor) {
    case 'anthropic':
      return new AnthropicProvider(providerId, resolved);
    case 'openai':
      return new OpenAIProvider(providerId, resolved);
    case 'google':
      return new GeminiProvider(providerId, resolved);
  }
}
