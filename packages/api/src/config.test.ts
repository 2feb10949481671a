import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.index).toMatchObject({ backend: 'pgvector', hybrid: true, table: 'vector_records', dimension: 3072 });
    expect(config.search).toEqual({ defaultTopK: 5, maxTopK: 20, defaultAlpha: 0.5 });
    expect(config.ingestion).toMatchObject({
      batchSize: 50,
      concurrency: 1,
      maxAttempts: 3,
      excludedTypes: ['Footer', 'Image', 'PageNumber'],
      prefixFilename: true,
    });
    expect(config.embeddingCache).toEqual({ enabled: true, ttlSeconds: 86400 });
  });

  it('coerces numbers, flags and lists', () => {
    const config = loadConfig({
      PORT: '8080',
      INDEX_HYBRID: 'false',
      INGEST_EXCLUDED_TYPES: 'Footer, Header,',
      SEARCH_DEFAULT_ALPHA: '0.8',
    });

    expect(config.port).toBe(8080);
    expect(config.index.hybrid).toBe(false);
    expect(config.ingestion.excludedTypes).toEqual(['Footer', 'Header']);
    expect(config.search.defaultAlpha).toBe(0.8);
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'eighty', INDEX_BACKEND: 'sqlite' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });

  it('rejects unsafe table names', () => {
    expect(() => loadConfig({ INDEX_TABLE: 'records; DROP TABLE x' })).toThrow(/INDEX_TABLE/);
  });

  it('rejects a default topK above the maximum', () => {
    expect(() => loadConfig({ SEARCH_DEFAULT_TOP_K: '30' })).toThrow(
      'SEARCH_DEFAULT_TOP_K must not exceed SEARCH_MAX_TOP_K'
    );
  });
});
