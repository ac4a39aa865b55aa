import { OpenAI } from "openai";

export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompleteOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Minimal text-completion surface the orchestrator depends on. */
export interface LlmClient {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

/** Turns text into vectors for the embedding-backed semantic store. */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAiOptions {
  apiKey?: string;
  model?: string;
  embeddingModel?: string;
  /** Inject a preconfigured client, mainly for tests. */
  client?: OpenAI;
}

function getClient(opts: OpenAiOptions): OpenAI {
  if (opts.client) return opts.client;
  const apiKey = opts.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is not set");
  }
  return new OpenAI({ apiKey });
}

/** Chat Completions backed `LlmClient`. */
export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(opts: OpenAiOptions = {}) {
    this.client = getClient(opts);
    this.model = opts.model ?? "gpt-4o-mini";
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const messages: LlmMessage[] = [];
    if (options.system) messages.push({ role: "system", content: options.system });
    messages.push({ role: "user", content: prompt });

    const r = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    });
    return r.choices[0]?.message?.content ?? "";
  }
}

/** OpenAI embeddings backed `Embedder`. */
export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(opts: OpenAiOptions = {}) {
    this.client = getClient(opts);
    this.model = opts.embeddingModel ?? "text-embedding-3-small";
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const r = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });
    return [...r.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }
}
