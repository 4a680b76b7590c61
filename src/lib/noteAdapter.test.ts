import { describe, expect, it, vi } from 'vitest';
import { WordNoteAdapter, createNoteGenerator } from './noteAdapter';
import type { NoteOptions } from '../types';

type FetchInput = Parameters<typeof fetch>[0];

type Route = (url: string, init?: RequestInit) => Response | Promise<Response>;

const NOW = new Date(2024, 0, 5, 9, 3, 7);
const OFFLINE: NoteOptions = { search: 'off', plain: false };

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function notFound(): Response {
  return new Response('not found', { status: 404 });
}

const DICTIONARY_ENTRY = [
  {
    word: 'apple',
    phonetics: [{ text: '/ˈæp.əl/' }, { text: '/ˈæp.əl/' }, {}],
    meanings: [
      {
        partOfSpeech: 'noun',
        definitions: [
          { definition: 'A round fruit.' },
          { definition: 'The tree bearing it.' },
        ],
      },
    ],
  },
];

function makeFetch(route: Route) {
  return vi.fn(async (input: FetchInput, init?: RequestInit) => route(String(input), init));
}

function freeSources(url: string): Response | null {
  if (url.includes('dictionaryapi.dev')) return json(DICTIONARY_ENTRY);
  if (url.startsWith('https://en.wikipedia.org')) return json({ title: 'Apple', extract: 'An apple is a fruit.' });
  if (url.startsWith('https://zh.wikipedia.org')) return notFound();
  return null;
}

describe('noteAdapter', () => {
  it('builds an offline note from the free sources when no keys are configured', async () => {
    const fetchMock = makeFetch((url) => freeSources(url) ?? notFound());
    const adapter = new WordNoteAdapter({ fetchImpl: fetchMock, now: () => NOW });

    const result = await adapter.explain(' apple ', OFFLINE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text.split('\n').slice(0, 8)).toEqual([
      '# apple',
      '> Offline note (2024-01-05 09:03)',
      '',
      '## Pronunciation',
      '- /ˈæp.əl/',
      '## Core senses',
      '- **noun**: A round fruit.',
      '  - also: The tree bearing it.',
    ]);
    expect(result.text).toContain('- EN: An apple is a fruit.');
    expect(result.text).not.toContain('- ZH:');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('asks the LLM when a key is configured and wraps its answer', async () => {
    const fetchMock = makeFetch((url) => {
      if (url === 'https://llm.test/v1/chat/completions') {
        return json({ choices: [{ message: { content: '  Body text  ' } }] });
      }
      return freeSources(url) ?? notFound();
    });
    const adapter = new WordNoteAdapter({
      openAiApiKey: 'test-key',
      openAiBaseUrl: 'https://llm.test/',
      model: 'test-model',
      fetchImpl: fetchMock,
      now: () => NOW,
    });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result).toEqual({ ok: true, text: '# apple\n> AI note (generated 2024-01-05 09:03)\n\nBody text' });

    const chatCall = fetchMock.mock.calls.find(([url]) => String(url).includes('/v1/chat/completions'));
    const init = chatCall?.[1];
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('test-model');
    expect(body.messages[1].content).toContain('**apple**');
    expect(body.messages[1].content).toContain('Phonetics: /ˈæp.əl/');
  });

  it('falls back to the offline note with a warning when the LLM fails', async () => {
    const fetchMock = makeFetch((url) => {
      if (url.includes('/v1/chat/completions')) return new Response('boom', { status: 500 });
      return freeSources(url) ?? notFound();
    });
    const adapter = new WordNoteAdapter({ openAiApiKey: 'test-key', fetchImpl: fetchMock, now: () => NOW });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text.startsWith('# apple\n> Offline note')).toBe(true);
    expect(result.text.endsWith('\n> ⚠️ LLM request failed: LLM request failed (500): boom\n')).toBe(true);
  });

  it('adds search references when web search is available', async () => {
    const fetchMock = makeFetch((url) => {
      if (url === 'https://api.tavily.com/search') {
        return json({
          answer: 'Apple is a fruit.',
          results: [{ title: 'Apple - Wiki', url: 'https://example.test/apple', content: 'text' }],
        });
      }
      return freeSources(url) ?? notFound();
    });
    const adapter = new WordNoteAdapter({ tavilyApiKey: 'test-search', fetchImpl: fetchMock, now: () => NOW });

    const result = await adapter.explain('apple', { search: 'auto', plain: false });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text).toContain('**References (automatic search)**\n> Search summary: Apple is a fruit.\n- [Apple - Wiki](https://example.test/apple)');
    const searchBody = JSON.parse(String(fetchMock.mock.calls.find(([url]) => String(url).includes('tavily'))?.[1]?.body));
    expect(searchBody.api_key).toBe('test-search');
    expect(searchBody.max_results).toBe(6);
  });

  it('passes the search size, depth and sentence count to the providers', async () => {
    const fetchMock = makeFetch((url) => {
      if (url === 'https://api.tavily.com/search') return json({ results: [] });
      if (url.includes('/v1/chat/completions')) return json({ choices: [{ message: { content: 'Body' } }] });
      return freeSources(url) ?? notFound();
    });
    const adapter = new WordNoteAdapter({
      openAiApiKey: 'test-key',
      tavilyApiKey: 'test-search',
      maxWebResults: 3,
      searchDepth: 'basic',
      sentenceCount: 8,
      fetchImpl: fetchMock,
      now: () => NOW,
    });

    const result = await adapter.explain('apple', { search: 'auto', plain: false });
    expect(result.ok).toBe(true);

    const searchBody = JSON.parse(String(fetchMock.mock.calls.find(([url]) => String(url).includes('tavily'))?.[1]?.body));
    expect(searchBody.max_results).toBe(3);
    expect(searchBody.search_depth).toBe('basic');
    const chatBody = JSON.parse(String(fetchMock.mock.calls.find(([url]) => String(url).includes('/v1/chat/completions'))?.[1]?.body));
    expect(chatBody.messages[1].content).toContain('7. 8 natural example sentences');
  });

  it('limits the templated examples of the offline note to the sentence count', async () => {
    const fetchMock = makeFetch((url) => freeSources(url) ?? notFound());
    const adapter = new WordNoteAdapter({ sentenceCount: 3, fetchImpl: fetchMock, now: () => NOW });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const lines = result.text.split('\n');
    const start = lines.indexOf('## Example sentences (templated)');
    expect(lines.slice(start + 1, start + 5)).toEqual([
      "1. I used the word 'apple' in a simple sentence.",
      "2. The meaning of 'apple' depends on the context.",
      "3. People often learn 'apple' through examples and practice.",
      '## Practice',
    ]);
  });

  it('strips heading markers in plain mode', async () => {
    const fetchMock = makeFetch((url) => freeSources(url) ?? notFound());
    const adapter = new WordNoteAdapter({ fetchImpl: fetchMock, now: () => NOW });

    const result = await adapter.explain('apple', { search: 'off', plain: true });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text.split('\n').slice(0, 4)).toEqual(['apple', '> Offline note (2024-01-05 09:03)', '', 'Pronunciation']);
  });

  it('fails with an auth error when web search is forced without a key', async () => {
    const fetchMock = makeFetch(() => notFound());
    const adapter = new WordNoteAdapter({ fetchImpl: fetchMock });

    const result = await adapter.explain('apple', { search: 'tavily', plain: false });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('auth');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails with a provider error when no source knows the word', async () => {
    const adapter = new WordNoteAdapter({ fetchImpl: makeFetch(() => notFound()) });

    const result = await adapter.explain('qwzx', OFFLINE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('provider');
    expect(result.error.message).toBe('Dictionary request failed (404): not found');
  });

  it('reports rejected LLM credentials when nothing else is available', async () => {
    const fetchMock = makeFetch((url) => (
      url.includes('/v1/chat/completions') ? new Response('invalid key', { status: 401 }) : notFound()
    ));
    const adapter = createNoteGenerator({ openAiApiKey: 'bad-key', fetchImpl: fetchMock });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('auth');
  });

  it('reports connection failures as network errors', async () => {
    const fetchMock = makeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const adapter = new WordNoteAdapter({ fetchImpl: fetchMock });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('network');
  });

  it('reports a timeout when the sources do not answer in time', async () => {
    const fetchMock = makeFetch((_url, init) => new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      signal?.addEventListener('abort', () => reject(signal.reason));
    }));
    const adapter = new WordNoteAdapter({ fetchImpl: fetchMock, timeoutMs: 20 });

    const result = await adapter.explain('apple', OFFLINE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('timeout');
  });
});
