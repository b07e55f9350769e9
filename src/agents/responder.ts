/**
 * Response generation: build a prompt from retrieved messages and ask the
 * chat model for an answer.
 */

import { createModuleLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { SearchResult } from '../rag/vectorstore.js';

const logger = createModuleLogger('responder');

// Only the best few hits go into the prompt
const MAX_CONTEXT_DOCS = 3;
const DISPLAY_SNIPPET_LENGTH = 200;

export const SYSTEM_PROMPT =
  'You are a helpful AI assistant that answers questions based on Slack workspace content and general knowledge.';

export const FALLBACK_RESPONSE =
  "I'm sorry, I encountered an error while processing your request. Please try again.";

export interface CompletionProvider {
  complete(prompt: string, contextDocs: SearchResult[]): Promise<string>;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * The slice of the OpenAI client used here. An `OpenAI` instance satisfies it.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        max_tokens: number;
        temperature: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAICompletionProviderOptions {
  client: ChatCompletionsClient;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export class OpenAICompletionProvider implements CompletionProvider {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: OpenAICompletionProviderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1000;
    this.temperature = options.temperature ?? 0.7;
  }

  async complete(prompt: string, contextDocs: SearchResult[]): Promise<string> {
    logger.debug(`Requesting completion with ${contextDocs.length} context documents`);

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Completion returned no content');
    }
    return content;
  }
}

/**
 * Build the user prompt: the question plus the top retrieved messages, each
 * attributed to its author, channel and time.
 */
export function buildContextPrompt(query: string, relevantDocs: SearchResult[]): string {
  if (relevantDocs.length === 0) {
    return `User question: ${query}\n\nPlease answer based on your general knowledge.`;
  }

  const context = relevantDocs
    .slice(0, MAX_CONTEXT_DOCS)
    .map((doc, i) => {
      const { authorName, channelName, timestamp } = doc.metadata;
      return `Message ${i + 1} (from ${authorName} in #${channelName} at ${timestamp}):\n${doc.text}`;
    })
    .join('\n\n');

  return `You are a helpful AI assistant with access to Slack workspace content.
Use the following context from the workspace to answer the user's question.
If the context doesn't contain relevant information, use your general knowledge.

Context from Slack workspace:
${context}

User question: ${query}

Please provide a helpful and accurate response based on the context above.`;
}

/**
 * Format search hits for display to a user.
 */
export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return 'No relevant content found in the server.';
  }

  return results
    .slice(0, MAX_CONTEXT_DOCS)
    .map((result, i) => {
      const { authorName, channelName, timestamp } = result.metadata;
      const content = result.text.length > DISPLAY_SNIPPET_LENGTH
        ? `${result.text.slice(0, DISPLAY_SNIPPET_LENGTH)}...`
        : result.text;
      return `*${i + 1}. From ${authorName} in #${channelName} (${timestamp})*\n${content}`;
    })
    .join('\n\n');
}

export class ResponseGenerator {
  private readonly provider: CompletionProvider;

  constructor(provider: CompletionProvider) {
    this.provider = provider;
  }

  /**
   * Answer `query` using the retrieved documents. A failing model call is
   * logged and answered with an apology instead of an exception.
   */
  async respond(query: string, relevantDocs: SearchResult[]): Promise<string> {
    const prompt = buildContextPrompt(query, relevantDocs);

    try {
      return await this.provider.complete(prompt, relevantDocs);
    } catch (error) {
      logger.error(`Failed to get AI response: ${getErrorMessage(error)}`);
      return FALLBACK_RESPONSE;
    }
  }
}
