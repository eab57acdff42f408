import { describe, it, expect } from 'vitest';
import { detectVisualElements } from '../pipeline/visual-detection.js';

describe('detectVisualElements', () => {
  it('suggests a flowchart for process cues', () => {
    expect(detectVisualElements('Describe the water cycle', 'Evaporation happens first.')).toEqual([
      { kind: 'flowchart', caption: 'Flowchart for: Describe the water cycle' },
    ]);
  });

  it('returns several kinds in a fixed order', () => {
    const question = 'How is the system of class inheritance organized?';
    expect(detectVisualElements(question, '').map((e) => e.kind)).toEqual(['block_diagram', 'hierarchy']);
  });

  it('shortens long questions in the caption', () => {
    const question = 'Explain the layered architecture of a web application and its deployment';
    expect(detectVisualElements(question, 'It separates presentation from data.')).toEqual([
      { kind: 'block_diagram', caption: 'Block diagram for: Explain the layered architecture of a web applicat...' },
    ]);
  });

  it('matches cues inside longer words and in the answer', () => {
    expect(detectVisualElements('Who designs workflows?', '').map((e) => e.kind)).toEqual(['block_diagram', 'flowchart']);
    expect(detectVisualElements('Name one', 'A binary TREE.').map((e) => e.kind)).toEqual(['hierarchy']);
  });

  it('suggests nothing without cues', () => {
    expect(detectVisualElements('Who wrote Hamlet?', 'Shakespeare wrote it.')).toEqual([]);
  });
});
