import type { KnowledgeEntry } from '../knowledge/knowledge-base.js';
import { getLanguageConfig, type LanguageCode } from '../lib/languages.js';

export interface BuiltContext {
  text: string;
  /** Entries that made it into `text`, in rank order. */
  used: KnowledgeEntry[];
}

export function renderContext(entries: KnowledgeEntry[]): string {
  if (entries.length === 0) return '';
  const parts = ['Relevant educational materials:'];
  entries.forEach((entry, i) => {
    parts.push(`\n${i + 1}. ${entry.topic} (${entry.subject}):\n${entry.content}`);
    if (entry.references.length > 0) {
      parts.push(`   References: ${entry.references.join(', ')}`);
    }
  });
  return parts.join('\n');
}

/**
 * Renders ranked entries into a context block of at most `budgetChars`.
 * Lowest-ranked entries are dropped first. When the top entry alone is over
 * budget its content is cut short rather than losing all context.
 */
export function buildContext(entries: KnowledgeEntry[], budgetChars: number): BuiltContext {
  const used = [...entries];
  let text = renderContext(used);

  while (used.length > 1 && text.length > budgetChars) {
    used.pop();
    text = renderContext(used);
  }

  const top = used[0];
  if (top && text.length > budgetChars) {
    const overflow = text.length - budgetChars;
    const keep = top.content.length - overflow - 1;
    if (keep <= 0) return { text: '', used: [] };
    const trimmed = { ...top, content: `${top.content.slice(0, keep)}…` };
    return { text: renderContext([trimmed]), used: [top] };
  }

  return { text, used };
}

const ANSWER_INSTRUCTIONS = '\nProvide a comprehensive, detailed answer that:'
  + '\n1. Directly addresses the question'
  + '\n2. Includes relevant explanations and examples'
  + '\n3. Is educationally sound and accurate'
  + '\n4. Uses clear, understandable language';

export function buildPrompt(question: string, context: BuiltContext, language: LanguageCode): string {
  const parts: string[] = [];

  const lang = getLanguageConfig(language);
  if (lang && lang.code !== 'en') {
    parts.push(`Please provide your answer in ${lang.name} (${lang.native_name}).`);
  }

  if (context.text) {
    parts.push(context.text);
    parts.push('\nUse the above educational materials to inform your answer. Include citations where appropriate.');
  } else {
    parts.push(
      'Note: No specialized educational materials were found for this topic. '
      + 'Please provide a comprehensive answer using general knowledge.',
    );
  }

  parts.push(`\nQuestion: ${question}`);
  parts.push(ANSWER_INSTRUCTIONS);
  if (context.used.length > 0) {
    parts.push('5. References the educational materials provided where relevant');
  }

  return parts.join('\n');
}

/** References of the used entries, first occurrence wins. */
export function collectCitations(used: KnowledgeEntry[]): string[] {
  const seen = new Set<string>();
  const citations: string[] = [];
  for (const entry of used) {
    for (const ref of entry.references) {
      if (seen.has(ref)) continue;
      seen.add(ref);
      citations.push(ref);
    }
  }
  return citations;
}
