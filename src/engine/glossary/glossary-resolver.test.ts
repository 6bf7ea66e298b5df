import { describe, expect, it } from 'vitest';
import { GlossaryResolver } from './glossary-resolver.js';
import { FakeProvider } from '../../test/fake-provider.js';
import { FAST_RETRY, testConfig } from '../../test/helpers.js';

const userGlossary = [{ sourceTerm: 'Mara', translations: { fr: 'Mara' } }];

describe('GlossaryResolver', () => {
  it('skips terminology entirely in quick mode', async () => {
    const provider = new FakeProvider();
    const resolver = new GlossaryResolver(provider, { retry: FAST_RETRY });

    const result = await resolver.resolve('excerpt', userGlossary, 'quick', testConfig());

    expect(result.origin).toBe('skipped');
    expect(result.glossary).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it('uses the user glossary as given in deep mode', async () => {
    const provider = new FakeProvider();
    const resolver = new GlossaryResolver(provider, { retry: FAST_RETRY });

    const result = await resolver.resolve('excerpt', userGlossary, 'deep', testConfig());

    expect(result).toMatchObject({ origin: 'user', glossary: userGlossary, generationCalls: 0 });
    expect(provider.calls).toHaveLength(0);
  });

  it('extracts terms from the excerpt when no glossary is given', async () => {
    const provider = new FakeProvider({
      terminology: () =>
        JSON.stringify({
          terms: [
            { source_term: 'Harbour Guild', proposed_translations: { fr: 'Guilde du Port' } },
            { source_term: 'broken' },
          ],
        }),
    });
    const resolver = new GlossaryResolver(provider, { retry: FAST_RETRY });

    const result = await resolver.resolve('The Harbour Guild met.', null, 'deep', testConfig());

    expect(result.origin).toBe('extracted');
    expect(result.glossary).toEqual([{ sourceTerm: 'Harbour Guild', translations: { fr: 'Guilde du Port' } }]);
    expect(result.generationCalls).toBe(1);
    expect(result.tokensUsed).toEqual({ prompt: 10, completion: 5, total: 15 });
    expect(provider.callsFor('terminology')[0].text).toContain('The Harbour Guild met.');
  });

  it('counts the tokens of attempts whose output could not be parsed', async () => {
    let calls = 0;
    const provider = new FakeProvider({
      terminology: () => (++calls === 1 ? 'not json' : JSON.stringify({ terms: [] })),
    });
    const resolver = new GlossaryResolver(provider, { retry: FAST_RETRY });

    const result = await resolver.resolve('excerpt', null, 'deep', testConfig());

    expect(result.origin).toBe('extracted');
    expect(result.generationCalls).toBe(2);
    expect(result.tokensUsed).toEqual({ prompt: 20, completion: 10, total: 30 });
  });

  it('falls back to an empty glossary when extraction keeps failing', async () => {
    const provider = new FakeProvider({ terminology: () => 'no json here' });
    const resolver = new GlossaryResolver(provider, { retry: FAST_RETRY });

    const result = await resolver.resolve('excerpt', null, 'deep', testConfig());

    expect(result.origin).toBe('fallback');
    expect(result.glossary).toEqual([]);
    expect(result.generationCalls).toBe(3);
    expect(result.tokensUsed).toEqual({ prompt: 30, completion: 15, total: 45 });
    expect(result.warning).toBe(
      'Terminology extraction failed, continuing without a glossary: Model output contains no JSON (after 3 attempts)'
    );
  });
});
