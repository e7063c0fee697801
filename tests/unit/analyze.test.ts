import { describe, it, expect, vi } from 'vitest';
import { analyze, createAnalyzer } from '../../src/analyze';
import { createStubFetcher } from '../helpers/stub-fetcher';

const NOTE_PAGE = `<html lang="en"><head><title>Compost basics</title></head><body><article>
  <p>Mix green kitchen scraps with brown leaves and turn the pile every couple of weeks to keep it aerated.</p>
  <p>A healthy heap smells earthy and should feel about as damp as a wrung-out sponge.</p>
</article></body></html>`;

describe('createAnalyzer', () => {
  it('reuses one manager for single and batch analysis', async () => {
    const stub = createStubFetcher({ 'https://garden.example/compost': { body: NOTE_PAGE } });
    const lens = createAnalyzer({ fetch: stub.fetch, logSink: vi.fn(), config: { detectLanguage: false } });

    const record = await lens.analyze('https://garden.example/compost');
    const batch = await lens.analyzeBatch(['https://garden.example/compost', 'https://garden.example/gone']);

    expect(record.title).toBe('Compost basics');
    expect(record.language).toBe('en');
    expect(batch.aggregate).toMatchObject({ succeeded: 1, failed: 1 });
    expect(lens.manager.config.detectLanguage).toBe(false);
  });
});

describe('analyze', () => {
  it('returns an error record for an invalid URL without throwing', async () => {
    const record = await analyze('mailto:someone@example.com', { logLevel: 'silent' });

    expect(record.status).toBe('error');
    expect(record.errorMessage).toBe('Not an absolute http(s) URL: mailto:someone@example.com');
  });
});
