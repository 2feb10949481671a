import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { normalizeChunkText, parseChunks, withFilenamePrefix } from './chunks';

describe('normalizeChunkText', () => {
  it('removes invisible characters and collapses whitespace', () => {
    expect(normalizeChunkText('  Pressure\u00A0valve\u200B spec \n\n')).toBe('Pressure valve spec');
    expect(normalizeChunkText('Soft\u00ADhyphen')).toBe('Softhyphen');
  });

  it('applies compatibility normalization and keeps case', () => {
    expect(normalizeChunkText('\uFB01lter Housing')).toBe('filter Housing');
  });

  it('reduces whitespace-only text to empty', () => {
    expect(normalizeChunkText(' \t\n\uFEFF ')).toBe('');
  });
});

describe('withFilenamePrefix', () => {
  it('prefixes the readable file stem', () => {
    expect(withFilenamePrefix('pump_manual_v2.pdf', 'Torque 40 Nm')).toBe('Document pump manual v2: Torque 40 Nm');
  });
});

describe('parseChunks', () => {
  it('accepts our own chunk shape', () => {
    expect(parseChunks([{ id: 'a1', text: 'Pressure valve spec', metadata: { filename: 'f.pdf', page_number: 3 } }])).toEqual([
      { id: 'a1', text: 'Pressure valve spec', metadata: { filename: 'f.pdf', page_number: 3 } },
    ]);
  });

  it('accepts partitioner output with element_id and a top-level type', () => {
    const [chunk] = parseChunks([
      { element_id: 'e1', type: 'Footer', text: 'p. 3', metadata: { filename: 'f.pdf', languages: ['eng'] } },
    ]);

    expect(chunk.id).toBe('e1');
    expect(chunk.metadata.type).toBe('Footer');
    expect(chunk.metadata.languages).toEqual(['eng']);
  });

  it('reports the path of an invalid chunk', () => {
    let caught: unknown;
    try {
      parseChunks([{ text: 'no id', metadata: { filename: 'f.pdf' } }], 'f.json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid chunk data in f.json',
      issues: [{ path: '0.id', message: 'Chunk requires an id or element_id' }],
    });
  });

  it('requires a filename', () => {
    expect(() => parseChunks([{ id: 'x', text: 't', metadata: {} }])).toThrow(ValidationError);
  });
});
