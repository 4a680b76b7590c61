import { trimText, wrapText } from './textLayout';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface DictionarySense {
  partOfSpeech: string;
  definitions: string[];
}

export interface DictionarySummary {
  phonetics: string[];
  senses: DictionarySense[];
}

export interface WikiSummary {
  title: string;
  extract: string;
}

export interface SearchItem {
  title: string;
  url: string;
  content: string;
}

export interface SearchResult {
  answer: string | null;
  items: SearchItem[];
}

export interface NoteSources {
  dictionary: DictionarySummary | null;
  wikiEn: WikiSummary | null;
  wikiZh: WikiSummary | null;
  search: SearchResult | null;
}

const DEFAULT_SENTENCE_COUNT = 6;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function recordList(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function unique(values: string[]): string[] {
  return values.filter((value, index) => value && values.indexOf(value) === index);
}

export function formatNoteTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function parseDictionaryPayload(payload: unknown): DictionarySummary | null {
  const entry = recordList(payload)[0];
  if (!entry) return null;

  const phonetics = unique(recordList(entry.phonetics).map((item) => stringField(item, 'text')));
  const senses = recordList(entry.meanings)
    .map((meaning) => ({
      partOfSpeech: stringField(meaning, 'partOfSpeech'),
      definitions: recordList(meaning.definitions)
        .map((definition) => stringField(definition, 'definition'))
        .filter(Boolean),
    }))
    .filter((sense) => sense.definitions.length > 0);

  if (phonetics.length === 0 && senses.length === 0) return null;
  return { phonetics, senses };
}

export function parseWikiPayload(payload: unknown): WikiSummary | null {
  if (!isRecord(payload)) return null;
  const extract = stringField(payload, 'extract').trim();
  if (!extract) return null;
  return { title: stringField(payload, 'title'), extract };
}

export function parseSearchPayload(payload: unknown): SearchResult {
  if (!isRecord(payload)) {
    throw new Error('Search response payload was not an object');
  }
  const answer = stringField(payload, 'answer').trim();
  return {
    answer: answer || null,
    items: recordList(payload.results).map((item) => ({
      title: stringField(item, 'title'),
      url: stringField(item, 'url'),
      content: stringField(item, 'content'),
    })),
  };
}

export function parseChatCompletionPayload(payload: unknown): string {
  if (!isRecord(payload)) {
    throw new Error('LLM response payload was not an object');
  }
  const choice = recordList(payload.choices)[0];
  const message = choice && isRecord(choice.message) ? choice.message : null;
  const content = message ? stringField(message, 'content').trim() : '';
  if (!content) {
    throw new Error('LLM response did not include message content');
  }
  return content;
}

export function buildWebQuery(word: string): string {
  return `${word} meaning and usage; collocations; common phrases; `
    + 'etymology; synonyms antonyms; example sentences; register; CEFR';
}

export function searchRefsForPrompt(search: SearchResult, snippetLength: number = 380): string {
  const lines: string[] = [];
  if (search.answer) {
    lines.push(`(search answer) ${trimText(search.answer, 600)}`);
  }
  search.items.slice(0, 8).forEach((item, index) => {
    if (!item.url) return;
    lines.push(`[${index + 1}] ${trimText(item.title, 120)} - ${item.url}\n    ${trimText(item.content, snippetLength)}`);
  });
  return lines.join('\n');
}

export function searchRefsForFooter(search: SearchResult, maxItems: number): string | null {
  const links: string[] = [];
  if (search.answer) {
    links.push(`> Search summary: ${trimText(search.answer, 240)}`);
  }
  for (const item of search.items.slice(0, maxItems)) {
    if (!item.url) continue;
    links.push(`- [${trimText(item.title || item.url, 80)}](${item.url})`);
  }
  return links.length > 0 ? links.join('\n') : null;
}

export function dictionarySummaryLine(dictionary: DictionarySummary): string {
  const parts: string[] = [];
  if (dictionary.phonetics.length > 0) {
    parts.push(`Phonetics: ${dictionary.phonetics.join(' / ')}`);
  }
  if (dictionary.senses.length > 0) {
    parts.push(`Senses: ${dictionary.senses
      .map((sense) => `${sense.partOfSpeech}: ${sense.definitions.slice(0, 2).join('; ')}`)
      .join(' | ')}`);
  }
  return parts.join(' | ');
}

export function buildNoteMessages(
  word: string,
  sources: NoteSources,
  sentenceCount: number = DEFAULT_SENTENCE_COUNT
): ChatMessage[] {
  const refs: string[] = [];
  if (sources.search) refs.push(`## Web search\n${searchRefsForPrompt(sources.search)}`);
  if (sources.wikiEn) refs.push(`## Wikipedia EN\n${trimText(sources.wikiEn.extract, 800)}`);
  if (sources.wikiZh) refs.push(`## Wikipedia ZH\n${trimText(sources.wikiZh.extract, 800)}`);
  if (sources.dictionary) refs.push(`## Dictionary summary\n${dictionarySummaryLine(sources.dictionary)}`);
  const refBlock = refs.length > 0 ? refs.join('\n\n') : '(no external references)';

  const system: ChatMessage = {
    role: 'system',
    content: [
      'You are a bilingual English-Chinese dictionary editor and writing coach for Chinese-speaking learners.',
      'Write mainly in Chinese with a clear structure that can be used directly as study notes.',
      'When the references disagree with common knowledge, follow the references and say what is uncertain.',
    ].join(' '),
  };

  const user: ChatMessage = {
    role: 'user',
    content: [
      `Explain the English word **${word}** thoroughly, in Markdown.`,
      '',
      'References found so far (for fact alignment, no need to cite each one):',
      refBlock,
      '',
      'Sections:',
      '1. Pronunciation and stress (UK/US where possible)',
      '2. Core senses with Chinese glosses, grouped by part of speech, one common collocation each',
      '3. Collocations, phrases and fixed expressions (at least 6)',
      '4. Synonyms and antonyms (5-10 each, with short notes on differences)',
      '5. Register and usage pitfalls',
      '6. Etymology and word family',
      `7. ${sentenceCount} natural example sentences, each with a Chinese translation and CEFR level if possible`,
      `8. ${Math.max(3, Math.floor(sentenceCount / 2))} sentence templates for the learner (Chinese cue + English pattern)`,
      '9. Exercises with answers: cloze, synonym choice, Chinese-to-English translation',
      '10. 4-6 longer chunks (3-8 words) with Chinese cues',
    ].join('\n'),
  };

  return [system, user];
}

export function renderLlmNote(word: string, body: string, footnote: string | null, now: Date): string {
  const head = `# ${word}\n> AI note (generated ${formatNoteTimestamp(now)})\n\n`;
  const tail = footnote ? `\n---\n**References (automatic search)**\n${footnote}\n` : '';
  return head + body.trim() + tail;
}

const EXAMPLE_TEMPLATES = [
  (word: string) => `I used the word '${word}' in a simple sentence.`,
  (word: string) => `The meaning of '${word}' depends on the context.`,
  (word: string) => `People often learn '${word}' through examples and practice.`,
  (word: string) => `Here is another example that clarifies '${word}'.`,
  (word: string) => `This phrase with '${word}' is common in daily speech.`,
];

/**
 * Note assembled from the free dictionary and encyclopedia sources alone, used
 * when no LLM is configured or the LLM call failed.
 */
export function renderFallbackNote(
  word: string,
  sources: NoteSources,
  footnote: string | null,
  now: Date,
  sentenceCount: number = DEFAULT_SENTENCE_COUNT
): string {
  const lines = [`# ${word}`, `> Offline note (${formatNoteTimestamp(now)})`, ''];

  const { dictionary, wikiEn, wikiZh } = sources;
  if (dictionary) {
    if (dictionary.phonetics.length > 0) {
      lines.push('## Pronunciation', `- ${dictionary.phonetics.join(' / ')}`);
    }
    lines.push('## Core senses');
    for (const sense of dictionary.senses) {
      lines.push(`- **${sense.partOfSpeech}**: ${sense.definitions[0]}`);
      for (const extra of sense.definitions.slice(1, 3)) {
        lines.push(`  - also: ${extra}`);
      }
    }
  }

  if (wikiEn || wikiZh) {
    lines.push('## Encyclopedia summary');
    if (wikiEn) lines.push(`- EN: ${wrapText(wikiEn.extract, 100).join('\n')}`);
    if (wikiZh) lines.push(`- ZH: ${wrapText(wikiZh.extract, 100).join('\n')}`);
  }

  lines.push('## Example sentences (templated)');
  EXAMPLE_TEMPLATES.slice(0, Math.max(3, sentenceCount)).forEach((template, index) => {
    lines.push(`${index + 1}. ${template(word)}`);
  });

  lines.push(
    '## Practice',
    '1) Cloze: I ____ this word by writing three sentences. (e.g. learned)',
    '2) Choice: Which is closest to the meaning of the word? (A) … (B) … (C) …',
    `3) Translation: write a sentence with **${word}** and translate it.`,
  );

  if (footnote) {
    lines.push('', '---', '**References (automatic search)**', footnote);
  }
  return `${lines.join('\n')}\n`;
}

export function stripMarkdownHeadings(markdown: string): string {
  return markdown.replace(/^#{1,6}\s*/gm, '');
}
