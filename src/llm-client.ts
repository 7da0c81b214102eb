import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import type { ConverseCommandInput, SystemContentBlock } from '@aws-sdk/client-bedrock-runtime';

export const DEFAULT_MODEL_ID = 'us.amazon.nova-micro-v1:0';

export interface ConverseOptions {
  system?: string;
  jsonSchema?: Record<string, unknown>;
  maxTokens?: number;
  /** Aborts the request; batch timeouts use it */
  signal?: AbortSignal;
}

export interface LlmResponse {
  text?: string;
  structuredOutput?: unknown;
  stopReason: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

/**
 * Single-turn text completion. Keyword and category strategies only depend on
 * this interface, so tests can script replies.
 */
export interface LlmClient {
  converse(prompt: string, options?: ConverseOptions): Promise<LlmResponse>;
  getModelId(): string;
}

export interface BedrockConfig {
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  modelId?: string;
  maxTokens?: number;
}

/**
 * Reply key of the item at `position` in a batch. Keys are positional so that
 * caller ids, which may repeat or look like positions, never reach the model.
 */
export function itemKey(position: number): string {
  return `item-${position + 1}`;
}

/**
 * Extracts a JSON value from model text: a fenced ```json block, the whole
 * text, or the outermost object. Returns undefined when nothing parses.
 */
export function parseStructuredOutput(text: string): unknown {
  const candidates: string[] = [];
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced?.[1]) candidates.push(fenced[1]);
  candidates.push(text);

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) candidates.push(text.slice(start, end + 1));

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate.trim());
    } catch {
      continue;
    }
  }
  return undefined;
}

export class BedrockLlmClient implements LlmClient {
  private client: BedrockRuntimeClient;
  private modelId: string;
  private maxTokens: number;

  constructor(config: BedrockConfig = {}) {
    const region = config.region || 'us-east-1';

    // Without explicit keys the SDK's default credential chain applies
    this.client = new BedrockRuntimeClient(
      config.accessKeyId && config.secretAccessKey
        ? { region, credentials: { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey } }
        : { region },
    );

    this.modelId = config.modelId || DEFAULT_MODEL_ID;
    this.maxTokens = config.maxTokens ?? 2048;
  }

  /**
   * Send one prompt. A JSON schema, when given, is appended to the system
   * prompt and the reply text is parsed into `structuredOutput`.
   */
  async converse(prompt: string, options: ConverseOptions = {}): Promise<LlmResponse> {
    const system: SystemContentBlock[] = [];
    if (options.system) {
      system.push({ text: options.system });
    }
    if (options.jsonSchema) {
      system.push({
        text: `You must respond with valid JSON matching this schema:\n${JSON.stringify(options.jsonSchema, null, 2)}`,
      });
    }

    const input: ConverseCommandInput = {
      modelId: this.modelId,
      messages: [{ role: 'user', content: [{ text: prompt }] }],
      system: system.length > 0 ? system : undefined,
      inferenceConfig: {
        maxTokens: options.maxTokens ?? this.maxTokens,
        temperature: 0.2, // Low temperature for repeatable output
      },
    };

    const response = await this.client.send(new ConverseCommand(input), { abortSignal: options.signal });

    const usage = response.usage;
    const result: LlmResponse = {
      stopReason: response.stopReason || 'unknown',
      usage: {
        inputTokens: usage?.inputTokens || 0,
        outputTokens: usage?.outputTokens || 0,
        totalTokens: usage?.totalTokens || 0,
      },
    };

    for (const content of response.output?.message?.content ?? []) {
      if ('text' in content && content.text) {
        result.text = content.text;
        if (options.jsonSchema) {
          result.structuredOutput = parseStructuredOutput(content.text);
        }
      }
    }

    return result;
  }

  getModelId(): string {
    return this.modelId;
  }
}
