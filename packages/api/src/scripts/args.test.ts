import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { parseIngestArgs } from './args';

describe('parseIngestArgs', () => {
  it('reads all flags', () => {
    expect(parseIngestArgs(['--dir', './chunks', '--batch-size', '25', '--report', 'out.json'])).toEqual({
      dir: './chunks',
      batchSize: 25,
      reportPath: 'out.json',
    });
  });

  it('leaves optional flags unset', () => {
    expect(parseIngestArgs(['--dir', 'chunks'])).toEqual({ dir: 'chunks' });
  });

  it('requires a directory', () => {
    expect(() => parseIngestArgs(['--batch-size', '10'])).toThrow(ValidationError);
    expect(() => parseIngestArgs(['--dir', '--report', 'x.json'])).toThrow(ValidationError);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => parseIngestArgs(['--dir', 'chunks', '--batch-size', '0'])).toThrow(ValidationError);
  });
});
