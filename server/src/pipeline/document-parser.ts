import { FileTooLargeError, NoQuestionsFoundError, UnsupportedFormatError } from '../lib/errors.js';
import type { DocumentInput, DocumentParser } from './types.js';

export const SUPPORTED_FORMATS = ['text', 'txt'] as const;

const NUMBERING = /^(?:\d+\.|Q\d+\.?|Question\s+\d+:?)\s*/im;
const BLANK_LINE = /\n\s*\n/;
const MIN_QUESTION_CHARS = 4;

/**
 * Splits a plain-text paper into questions. Numbered markers ("1.", "Q2",
 * "Question 3:") take precedence; without them, blank lines separate
 * questions; failing both, the whole text is one question.
 */
export function splitQuestions(text: string): string[] {
  if (!text.trim()) return [];

  let parts = text.split(NUMBERING);
  if (parts.length <= 1) parts = text.split(BLANK_LINE);

  const questions = parts
    .map((part) => part.trim())
    .filter((part) => part.length >= MIN_QUESTION_CHARS);

  return questions.length > 0 ? questions : [text.trim()];
}

export class TextDocumentParser implements DocumentParser {
  constructor(private readonly maxBytes: number) {}

  parse(document: DocumentInput): string[] {
    const format = document.format.toLowerCase();
    if (!SUPPORTED_FORMATS.some((f) => f === format)) {
      throw new UnsupportedFormatError(document.format, SUPPORTED_FORMATS);
    }

    const size = Buffer.byteLength(document.content, 'utf8');
    if (size > this.maxBytes) throw new FileTooLargeError(size, this.maxBytes);

    const questions = splitQuestions(document.content);
    if (questions.length === 0) throw new NoQuestionsFoundError();
    return questions;
  }
}
