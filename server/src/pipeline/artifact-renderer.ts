import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { getLanguageConfig } from '../lib/languages.js';
import type { QuestionOutcome } from '../lib/session-store.js';
import type { ArtifactRenderer, RenderInput } from './types.js';

export function artifactFileName(sessionId: string): string {
  return `answers_${sessionId}.md`;
}

function renderOutcome(outcome: QuestionOutcome): string {
  const lines = [`## Question ${outcome.index + 1}`, '', outcome.question, '', '### Answer', ''];
  lines.push(outcome.answer ?? `_Answer unavailable: ${outcome.error ?? 'unknown error'}_`);

  if (outcome.visualElements.length > 0) {
    lines.push('', '### Suggested visual aids', '');
    for (const element of outcome.visualElements) lines.push(`- ${element.caption} (${element.kind})`);
  }
  if (outcome.citations.length > 0) {
    lines.push('', '### References', '');
    outcome.citations.forEach((ref, i) => lines.push(`${i + 1}. ${ref}`));
  }
  return lines.join('\n');
}

export function renderMarkdown(input: RenderInput): string {
  const language = getLanguageConfig(input.language);
  const header = [
    '# Answers',
    '',
    `Session: ${input.sessionId}`,
    `Language: ${language ? `${language.name} (${language.native_name})` : input.language}`,
    '',
  ].join('\n');
  const body = [...input.outcomes]
    .sort((a, b) => a.index - b.index)
    .map(renderOutcome)
    .join('\n\n');
  return `${header}\n${body}\n`;
}

/**
 * Writes the answer document under `outputDir` and returns its file name,
 * which is the artifact reference the download path resolves.
 */
export class MarkdownArtifactRenderer implements ArtifactRenderer {
  constructor(private readonly outputDir: string) {}

  async render(input: RenderInput): Promise<string | null> {
    if (input.outcomes.length === 0) return null;
    await mkdir(this.outputDir, { recursive: true });
    const fileName = artifactFileName(input.sessionId);
    await writeFile(path.join(this.outputDir, fileName), renderMarkdown(input), {
      encoding: 'utf8',
      signal: input.signal,
    });
    return fileName;
  }
}
