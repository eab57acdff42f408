import type { VisualElementKind, VisualElementSpec } from '../lib/session-store.js';

const CUES: ReadonlyArray<{ kind: VisualElementKind; label: string; keywords: readonly string[] }> = [
  {
    kind: 'block_diagram',
    label: 'Block diagram',
    keywords: ['system', 'component', 'module', 'architecture', 'structure', 'design', 'layer', 'tier', 'service', 'microservice'],
  },
  {
    kind: 'flowchart',
    label: 'Flowchart',
    keywords: ['process', 'workflow', 'steps', 'procedure', 'algorithm', 'flow', 'sequence', 'stage', 'phase', 'cycle'],
  },
  {
    kind: 'hierarchy',
    label: 'Hierarchy diagram',
    keywords: ['hierarchy', 'tree', 'organization', 'classification', 'taxonomy', 'inheritance', 'parent', 'child', 'level'],
  },
];

const CAPTION_QUESTION_CHARS = 50;

/**
 * Decides which diagrams would help, from keyword cues in the question and
 * answer. Matching is by substring, so "workflows" cues a flowchart. At most
 * one element per kind, in block_diagram, flowchart, hierarchy order.
 */
export function detectVisualElements(question: string, answer: string): VisualElementSpec[] {
  const haystack = `${question} ${answer}`.toLowerCase();
  const subject = question.length > CAPTION_QUESTION_CHARS
    ? `${question.slice(0, CAPTION_QUESTION_CHARS)}...`
    : question;

  return CUES
    .filter((cue) => cue.keywords.some((keyword) => haystack.includes(keyword)))
    .map((cue) => ({ kind: cue.kind, caption: `${cue.label} for: ${subject}` }));
}
