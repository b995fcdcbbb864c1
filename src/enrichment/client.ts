import Anthropic from "@anthropic-ai/sdk";

export const DEFAULT_MODEL = "claude-haiku-4-5";

export interface CompletionOptions {
  maxTokens: number;
  temperature?: number;
  system?: string;
  timeoutMs?: number;
}

export interface Completion {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionClient {
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<Completion>;
}

export class AnthropicCompletionClient implements CompletionClient {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    readonly model: string = DEFAULT_MODEL
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<Completion> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        system: options.system,
        messages: [
          {
            role: "user",
            content: prompt,
          },
        ],
      },
      { timeout: options.timeoutMs }
    );

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      text,
      model: this.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}
