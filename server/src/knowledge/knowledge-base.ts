import { readFileSync } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import logger from '../lib/logger.js';

export const knowledgeEntrySchema = z.object({
  id: z.string().min(1).optional(),
  subject: z.string().min(1),
  topic: z.string().min(1),
  content: z.string().min(1),
  language: z.string().min(2).default('en'),
  references: z.array(z.string()).default([]),
});

export type KnowledgeEntryInput = z.input<typeof knowledgeEntrySchema>;
export type KnowledgeEntry = Required<z.output<typeof knowledgeEntrySchema>>;

/**
 * Read-only similarity search over educational material. Implementations
 * return an empty list, never an error, when nothing matches.
 */
export interface KnowledgeRetriever {
  search(question: string, language: string, topK: number): Promise<KnowledgeEntry[]>;
}

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'explain', 'for', 'from',
  'how', 'in', 'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'what',
  'when', 'where', 'which', 'who', 'why', 'with',
]);

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return words.filter((w) => w.length > 1 && !STOPWORDS.has(w));
}

interface TermVector {
  terms: Map<string, number>;
  norm: number;
}

function vectorize(text: string): TermVector {
  const terms = new Map<string, number>();
  for (const token of tokenize(text)) {
    terms.set(token, (terms.get(token) ?? 0) + 1);
  }
  let sumSquares = 0;
  for (const count of terms.values()) sumSquares += count * count;
  return { terms, norm: Math.sqrt(sumSquares) };
}

function cosine(a: TermVector, b: TermVector): number {
  if (a.norm === 0 || b.norm === 0) return 0;
  const [small, large] = a.terms.size <= b.terms.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, count] of small.terms) {
    dot += count * (large.terms.get(term) ?? 0);
  }
  return dot / (a.norm * b.norm);
}

interface IndexedEntry {
  entry: KnowledgeEntry;
  vector: TermVector;
}

/**
 * Bag-of-words cosine similarity over topic, subject and content.
 * Ranking is by score descending; equal scores keep insertion order.
 */
export class InMemoryKnowledgeBase implements KnowledgeRetriever {
  private readonly entries: IndexedEntry[] = [];

  constructor(entries: KnowledgeEntryInput[] = []) {
    for (const entry of entries) this.add(entry);
  }

  add(input: KnowledgeEntryInput): KnowledgeEntry {
    const parsed = knowledgeEntrySchema.parse(input);
    const entry: KnowledgeEntry = { ...parsed, id: parsed.id ?? randomUUID() };
    const existing = this.entries.findIndex((e) => e.entry.id === entry.id);
    const indexed = { entry, vector: vectorize(`${entry.topic} ${entry.subject} ${entry.content}`) };
    if (existing >= 0) {
      this.entries[existing] = indexed;
    } else {
      this.entries.push(indexed);
    }
    return entry;
  }

  get size(): number {
    return this.entries.length;
  }

  subjects(): string[] {
    return [...new Set(this.entries.map((e) => e.entry.subject))].sort();
  }

  async search(question: string, language: string, topK: number): Promise<KnowledgeEntry[]> {
    if (topK <= 0) return [];
    const query = vectorize(question);
    if (query.norm === 0) return [];

    return this.entries
      .filter((e) => e.entry.language === language)
      .map((e) => ({ entry: e.entry, score: cosine(query, e.vector) }))
      .filter((scored) => scored.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((scored) => ({ ...scored.entry, references: [...scored.entry.references] }));
  }
}

const DEFAULT_SEED_URL = new URL('../../data/knowledge-seed.json', import.meta.url);

/**
 * Builds the knowledge base from the bundled seed file. A missing or invalid
 * seed leaves the base empty; answer generation then runs without context.
 */
export function loadKnowledgeBase(seedPath: URL | string = DEFAULT_SEED_URL): InMemoryKnowledgeBase {
  const base = new InMemoryKnowledgeBase();
  try {
    const parsed = z.array(knowledgeEntrySchema).safeParse(JSON.parse(readFileSync(seedPath, 'utf8')));
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Knowledge seed failed validation, starting empty');
      return base;
    }
    for (const entry of parsed.data) base.add(entry);
    logger.info({ entries: base.size, subjects: base.subjects() }, 'Knowledge base loaded');
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Knowledge seed could not be read, starting empty');
  }
  return base;
}
