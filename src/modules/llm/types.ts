import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { Closeable } from '../capabilities/types';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Prompt in, completion text out. */
export interface TextGenerator extends Closeable {
  readonly provider: string;
  readonly model: string;
  generate(prompt: string, systemPrompt?: string): Promise<string>;
}

export interface TextGeneratorOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  /** First retry delay; doubles on each further attempt. */
  retryBackoffMs?: number;
  temperature?: number;
  dispatcher?: Dispatcher;
}

export interface ChatCompletionRequest {
  model: string;
  messages: Message[];
  temperature?: number;
}

export const chatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

export interface AnthropicMessagesRequest {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  temperature?: number;
}

export const anthropicMessagesResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
});

export type AnthropicMessagesResponse = z.infer<typeof anthropicMessagesResponseSchema>;
