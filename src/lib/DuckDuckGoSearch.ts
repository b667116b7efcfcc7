import { z } from 'zod';
import type { RawSearchResult, WebSearch } from '../types';

const TopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional()
});

const InstantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  RelatedTopics: z
    .array(
      z.union([
        TopicSchema.extend({ Text: z.string() }),
        z.object({ Name: z.string().optional(), Topics: z.array(TopicSchema).default([]) })
      ])
    )
    .default([])
});

type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

function topicToResult(topic: z.infer<typeof TopicSchema>): RawSearchResult {
  const text = topic.Text ?? '';
  const [title, ...rest] = text.split(' - ');
  return {
    title: title?.trim() || undefined,
    snippet: rest.join(' - ').trim() || text,
    url: topic.FirstURL
  };
}

/** Flattens an instant-answer payload into ranked raw results. */
export function toSearchResults(answer: InstantAnswer, limit: number): RawSearchResult[] {
  const results: RawSearchResult[] = [];

  if (answer.Heading && answer.AbstractText) {
    results.push({ title: answer.Heading, snippet: answer.AbstractText, url: answer.AbstractURL });
  }

  for (const entry of answer.RelatedTopics) {
    if ('Topics' in entry) {
      results.push(...entry.Topics.map(topicToResult));
    } else {
      results.push(topicToResult(entry));
    }
  }

  return results.slice(0, limit);
}

/**
 * WebSearch over the DuckDuckGo instant-answer API. No key is needed; the
 * endpoint returns topic summaries rather than full recipes.
 */
export class DuckDuckGoSearch implements WebSearch {
  constructor(
    private readonly endpoint: string = 'https://api.duckduckgo.com/',
    private readonly limit: number = 8
  ) {}

  async lookup(query: string): Promise<RawSearchResult[]> {
    const params = new URLSearchParams({ q: query, format: 'json', no_html: '1', skip_disambig: '1' });
    const response = await fetch(`${this.endpoint}?${params.toString()}`, { headers: { Accept: 'application/json' } });

    if (!response.ok) {
      throw new Error(`Web search error: ${response.status} ${response.statusText}`);
    }

    const payload: unknown = await response.json();
    const parsed = InstantAnswerSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected web search payload: ${parsed.error.message}`);
    }

    return toSearchResults(parsed.data, this.limit);
  }
}
