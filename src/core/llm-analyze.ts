import OpenAI from "openai";

export type CompletionRequest = {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
};

/** Anything that can turn a prompt into a short piece of text. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export type OpenAIClientOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const start = Date.now();
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });
    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    console.log(`  LLM responded in ${elapsed}s`);

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`Empty completion from ${this.options.model}`);
    }
    return content;
  }
}
