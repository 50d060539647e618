import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { runWithConcurrency } from '../concurrency';
import { ModelRequestError } from '../curation/errors';
import type { FetchFn } from '../http';
import { defaultLogger, describeError, type CurationLogger } from '../logging';
import { formatSearchHits, type SearchAugmenter } from '../search/searxng';
import { chunkText, DEFAULT_MAX_CHARS } from '../text/paragraphs';
import { decodeModelAnswer, type DecodedObject } from './decode';
import type { DecodeOutcomeSink } from './outcome-sink';
import { PROMPT_TEMPLATES, type PromptTask, type PromptTemplateSet } from './prompts';

export interface ModelEndpoint {
  endpointUrl: string;
  apiKey: string;
  modelName: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ClassificationResult {
  author: string | null;
  authorEnglishName: string | null;
  authorChineseName: string | null;
  category: string | string[] | null;
  coverImagePrompt: string | null;
  raw: DecodedObject;
}

export interface AuthorInfo {
  englishName: string | null;
  chineseName: string | null;
  introduction: string | null;
}

export interface FieldInfo {
  category: string | null;
  reason: string | null;
}

export interface ArticleInfoRequest {
  prompt: string;
  /** Key for decode logs, normally the article page id. */
  tag?: string;
  /** Text the web search query is derived from; defaults to the prompt. */
  searchSeed?: string;
  withCategories: boolean;
}

export interface TranslateOptions {
  whole?: boolean;
  maxChars?: number;
}

interface ModelClientOptions {
  endpoint: ModelEndpoint;
  sink: DecodeOutcomeSink;
  search?: SearchAugmenter | null;
  prompts?: PromptTemplateSet;
  fetch?: FetchFn;
  logger?: CurationLogger;
  requestTimeoutMs?: number;
  translationConcurrency?: number;
  generateTag?: () => string;
}

export const SEARCH_CONTEXT_START = '<<<SEARCH_RESULTS>>>';
export const SEARCH_CONTEXT_END = '<<<END_SEARCH_RESULTS>>>';

const DEFAULT_TIMEOUT_MS = 120_000;

const looseString = z
  .unknown()
  .transform((value) => (typeof value === 'string' || typeof value === 'number' ? String(value) : null));

const classificationSchema = z.object({
  author: looseString,
  author_english_name: looseString,
  author_chinese_name: looseString,
  category: z.union([z.string(), z.array(z.string())]).nullish().catch(null),
  cover_image_prompt: looseString,
});

const authorInfoSchema = z.object({
  'english name': looseString,
  'chinese name': looseString,
  introduction: looseString,
});

const fieldInfoSchema = z.object({
  category: looseString,
  reason: looseString,
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }).passthrough(),
      }).passthrough(),
    )
    .min(1),
});

interface AskOptions {
  tag: string;
  searchSeed?: string;
  augment: boolean;
}

/**
 * Chat-completions client for the curation tasks. Web search context is
 * added when a SearchAugmenter is supplied; in that mode every prompt and
 * raw answer is kept in the outcome sink.
 */
export class ModelClient {
  private readonly endpoint: ModelEndpoint;

  private readonly sink: DecodeOutcomeSink;

  private readonly search: SearchAugmenter | null;

  private readonly prompts: PromptTemplateSet;

  private readonly fetchImpl: FetchFn;

  private readonly logger: CurationLogger;

  private readonly requestTimeoutMs: number;

  private readonly translationConcurrency: number;

  private readonly generateTag: () => string;

  constructor(options: ModelClientOptions) {
    this.endpoint = options.endpoint;
    this.sink = options.sink;
    this.search = options.search ?? null;
    this.prompts = options.prompts ?? PROMPT_TEMPLATES;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? defaultLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.translationConcurrency = options.translationConcurrency ?? 2;
    this.generateTag = options.generateTag ?? randomUUID;
  }

  async complete(messages: ChatMessage[]): Promise<string | null> {
    try {
      return await this.sendRequest(messages);
    } catch (error) {
      this.logger.error('model.request.failed', {
        code: error instanceof ModelRequestError ? error.code : 'MODEL_REQUEST_FAILED',
        model: this.endpoint.modelName,
        ...(error instanceof ModelRequestError ? error.details : {}),
        ...describeError(error),
      });
      return null;
    }
  }

  async getArticleInfo(request: ArticleInfoRequest): Promise<ClassificationResult | null> {
    const decoded = await this.askJson(
      request.withCategories ? 'articleInfo' : 'articleAuthor',
      request.prompt,
      { tag: request.tag ?? this.generateTag(), searchSeed: request.searchSeed, augment: true },
    );
    if (!decoded) {
      return null;
    }
    const parsed = classificationSchema.parse(decoded);
    return {
      author: parsed.author,
      authorEnglishName: parsed.author_english_name,
      authorChineseName: parsed.author_chinese_name,
      category: request.withCategories ? parsed.category ?? null : null,
      coverImagePrompt: request.withCategories ? parsed.cover_image_prompt : null,
      raw: decoded,
    };
  }

  async getAuthorInfo(input: { id?: string; name: string; description?: string | null }): Promise<AuthorInfo | null> {
    const decoded = await this.askJson('authorInfo', `${input.name}, ${input.description ?? ''}`, {
      tag: input.id ?? this.generateTag(),
      searchSeed: input.name,
      augment: true,
    });
    if (!decoded) {
      return null;
    }
    const parsed = authorInfoSchema.parse(decoded);
    return {
      englishName: parsed['english name'],
      chineseName: parsed['chinese name'],
      introduction: parsed.introduction,
    };
  }

  async getFieldInfo(input: { id?: string; name: string }): Promise<FieldInfo | null> {
    const decoded = await this.askJson('fieldInfo', input.name, {
      tag: input.id ?? this.generateTag(),
      augment: false,
    });
    if (!decoded) {
      return null;
    }
    return fieldInfoSchema.parse(decoded);
  }

  async translate(text: string, options: TranslateOptions = {}): Promise<string | null> {
    const chunks = chunkText(text, options.maxChars ?? DEFAULT_MAX_CHARS);
    const requests = options.whole ? [chunks.join('\n\n')] : chunks;
    const translated: Array<{ index: number; text: string | null }> = [];

    await runWithConcurrency(requests, this.translationConcurrency, async (chunk, index) => {
      const answer = await this.ask('translation', chunk, { tag: this.generateTag(), augment: false });
      translated.push({ index, text: answer ? answer.answer.trim() : null });
    });

    translated.sort((a, b) => a.index - b.index);
    const parts: string[] = [];
    for (const entry of translated) {
      if (entry.text === null) {
        this.logger.error('model.translate.failed', { chunk: entry.index, chunks: requests.length });
        return null;
      }
      parts.push(entry.text);
    }
    return parts.join('\n');
  }

  private async askJson(task: PromptTask, content: string, options: AskOptions): Promise<DecodedObject | null> {
    const result = await this.ask(task, content, options);
    if (!result) {
      return null;
    }
    const decoded = decodeModelAnswer(result.answer);
    if (!decoded) {
      this.logger.error('model.decode.failed', { task, tag: options.tag });
      await this.recordOutcome({ kind: 'decode_failure', tag: options.tag, prompt: result.prompt, response: result.answer });
    }
    return decoded;
  }

  private async ask(
    task: PromptTask,
    content: string,
    options: AskOptions,
  ): Promise<{ prompt: string; answer: string } | null> {
    const augmenting = options.augment && this.search !== null;
    let prompt = content;
    if (augmenting && this.search) {
      const hits = await this.search.lookup(options.searchSeed ?? content);
      prompt = [content, '', SEARCH_CONTEXT_START, formatSearchHits(hits), SEARCH_CONTEXT_END].join('\n');
    }

    const answer = await this.complete([
      { role: 'system', content: this.prompts[task] },
      { role: 'user', content: prompt },
    ]);

    if (augmenting) {
      await this.recordOutcome({ kind: 'audit', tag: options.tag, prompt, response: answer ?? '' });
    }
    return answer === null ? null : { prompt, answer };
  }

  private async recordOutcome(outcome: Parameters<DecodeOutcomeSink['record']>[0]): Promise<void> {
    try {
      await this.sink.record(outcome);
    } catch (error) {
      this.logger.error('model.sink.failed', { tag: outcome.tag, kind: outcome.kind, ...describeError(error) });
    }
  }

  private async sendRequest(messages: ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs).unref?.();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.endpoint.apiKey) {
      headers.Authorization = `Bearer ${this.endpoint.apiKey}`;
    }

    try {
      const response = await this.fetchImpl(`${this.endpoint.endpointUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.endpoint.modelName, messages, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ModelRequestError(`Model request failed (status ${response.status})`, {
          details: { status: response.status },
        });
      }

      const data: unknown = await response.json();
      const parsed = chatResponseSchema.safeParse(data);
      const content = parsed.success ? parsed.data.choices[0].message.content : null;
      if (content === null) {
        throw new ModelRequestError('Model response carried no message content');
      }
      return content;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}
