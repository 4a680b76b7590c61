import type { NoteOptions, SearchDepth } from '../types';
import {
  GenerationError,
  HttpStatusError,
  classifyGenerationError,
  describeError,
} from './errors';
import {
  buildNoteMessages,
  buildWebQuery,
  parseChatCompletionPayload,
  parseDictionaryPayload,
  parseSearchPayload,
  parseWikiPayload,
  renderFallbackNote,
  renderLlmNote,
  searchRefsForFooter,
  stripMarkdownHeadings,
} from './notePrompts';
import type {
  ChatMessage,
  DictionarySummary,
  NoteSources,
  SearchResult,
  WikiSummary,
} from './notePrompts';

export type NoteResult =
  | { ok: true; text: string }
  | { ok: false; error: GenerationError };

export interface NoteGenerator {
  explain(term: string, options: NoteOptions): Promise<NoteResult>;
}

export interface WordNoteAdapterOptions {
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  model?: string;
  tavilyApiKey?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  maxWebResults?: number;
  searchDepth?: SearchDepth;
  sentenceCount?: number;
  now?: () => Date;
}

type FetchInput = Parameters<typeof fetch>[0];

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com';
const DICTIONARY_API_BASE_URL = 'https://api.dictionaryapi.dev/api/v2/entries/en';
const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_WEB_RESULTS = 6;
const DEFAULT_SENTENCE_COUNT = 6;
const USER_AGENT = 'wordtrainer/0.3';

async function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error };
  }
}

function settledValue<T>(result: Settled<T | null> | null): T | null {
  return result?.ok ? result.value : null;
}

export class WordNoteAdapter implements NoteGenerator {
  private readonly openAiApiKey: string | undefined;
  private readonly openAiBaseUrl: string;
  private readonly model: string;
  private readonly tavilyApiKey: string | undefined;
  private readonly fetchImpl: (input: FetchInput, init?: RequestInit) => Promise<Response>;
  private readonly timeoutMs: number;
  private readonly maxWebResults: number;
  private readonly searchDepth: SearchDepth;
  private readonly sentenceCount: number;
  private readonly now: () => Date;

  constructor(options: WordNoteAdapterOptions = {}) {
    this.openAiApiKey = options.openAiApiKey?.trim() || undefined;
    this.openAiBaseUrl = (options.openAiBaseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, '');
    this.model = options.model ?? DEFAULT_MODEL;
    this.tavilyApiKey = options.tavilyApiKey?.trim() || undefined;
    const selectedFetch = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.fetchImpl = (input, init) => selectedFetch(input, init);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxWebResults = Math.max(1, Math.min(15, options.maxWebResults ?? DEFAULT_MAX_WEB_RESULTS));
    this.searchDepth = options.searchDepth ?? 'advanced';
    this.sentenceCount = Math.max(1, Math.min(20, options.sentenceCount ?? DEFAULT_SENTENCE_COUNT));
    this.now = options.now ?? (() => new Date());
  }

  async explain(term: string, options: NoteOptions): Promise<NoteResult> {
    const word = term.trim();
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const markdown = await this.generate(word, options, signal);
      return { ok: true, text: options.plain ? stripMarkdownHeadings(markdown) : markdown };
    } catch (error) {
      return { ok: false, error: classifyGenerationError(error) };
    }
  }

  private async generate(word: string, options: NoteOptions, signal: AbortSignal): Promise<string> {
    if (options.search === 'tavily' && !this.tavilyApiKey) {
      throw new GenerationError('auth', 'Web search requires TAVILY_API_KEY');
    }
    const useSearch = options.search === 'tavily' || (options.search === 'auto' && Boolean(this.tavilyApiKey));

    const [search, dictionary, wikiEn, wikiZh] = await Promise.all([
      useSearch ? settle(this.fetchSearch(word, signal)) : Promise.resolve(null),
      settle(this.fetchDictionary(word, signal)),
      settle(this.fetchWikiSummary(word, 'en', signal)),
      settle(this.fetchWikiSummary(word, 'zh', signal)),
    ]);
    signal.throwIfAborted();

    const sources: NoteSources = {
      search: settledValue(search),
      dictionary: settledValue(dictionary),
      wikiEn: settledValue(wikiEn),
      wikiZh: settledValue(wikiZh),
    };
    const footnote = sources.search ? searchRefsForFooter(sources.search, this.maxWebResults) : null;

    let llmFailure: unknown = null;
    if (this.openAiApiKey) {
      try {
        const body = await this.callChat(buildNoteMessages(word, sources, this.sentenceCount), signal);
        return renderLlmNote(word, body, footnote, this.now());
      } catch (error) {
        signal.throwIfAborted();
        llmFailure = error;
      }
    }

    if (!sources.dictionary && !sources.wikiEn && !sources.wikiZh) {
      if (llmFailure) throw llmFailure;
      throw dictionary.ok
        ? new GenerationError('provider', `No dictionary or encyclopedia entry found for "${word}"`)
        : dictionary.error;
    }

    let markdown = renderFallbackNote(word, sources, footnote, this.now(), this.sentenceCount);
    if (llmFailure) {
      markdown += `\n> ⚠️ LLM request failed: ${describeError(llmFailure)}\n`;
    }
    return markdown;
  }

  private async requestJson(service: string, url: string, init: RequestInit): Promise<unknown> {
    const response = await this.fetchImpl(url, init);
    if (!response.ok) {
      const message = (await response.text()).trim().slice(0, 160);
      throw new HttpStatusError(service, response.status, message || response.statusText);
    }
    try {
      return await response.json();
    } catch {
      throw new Error(`${service} response was not valid JSON`);
    }
  }

  private async fetchDictionary(word: string, signal: AbortSignal): Promise<DictionarySummary | null> {
    const payload = await this.requestJson(
      'Dictionary',
      `${DICTIONARY_API_BASE_URL}/${encodeURIComponent(word)}`,
      { signal }
    );
    return parseDictionaryPayload(payload);
  }

  private async fetchWikiSummary(word: string, lang: 'en' | 'zh', signal: AbortSignal): Promise<WikiSummary | null> {
    const payload = await this.requestJson(
      'Wikipedia',
      `https://${lang}.wikipedia.org/api/rest_v1/page/summary/${encodeURIComponent(word)}`,
      { signal, headers: { 'User-Agent': USER_AGENT } }
    );
    return parseWikiPayload(payload);
  }

  private async fetchSearch(word: string, signal: AbortSignal): Promise<SearchResult> {
    const payload = await this.requestJson('Search', TAVILY_SEARCH_URL, {
      method: 'POST',
      signal,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        api_key: this.tavilyApiKey,
        query: buildWebQuery(word),
        search_depth: this.searchDepth,
        include_answer: true,
        max_results: this.maxWebResults,
        include_images: false,
        include_raw_content: false,
        topic: 'general',
      }),
    });
    return parseSearchPayload(payload);
  }

  private async callChat(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    const payload = await this.requestJson('LLM', `${this.openAiBaseUrl}/v1/chat/completions`, {
      method: 'POST',
      signal,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.openAiApiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        temperature: 0.3,
        max_tokens: 2200,
        messages,
      }),
    });
    return parseChatCompletionPayload(payload);
  }
}

export function createNoteGenerator(options: WordNoteAdapterOptions): NoteGenerator {
  return new WordNoteAdapter(options);
}
