import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError } from '@/core/errors.js';

const mockEmbeddingsCreate = vi.fn();
vi.mock('openai', () => {
  class MockOpenAI {
    embeddings = {
      create: mockEmbeddingsCreate,
    };
  }
  return { default: MockOpenAI };
});

const { createEmbeddingProvider, resolveEmbeddingProvider } = await import('./embeddings.js');

describe('createEmbeddingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the first embedding vector', async () => {
    mockEmbeddingsCreate.mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3] }] });
    const embed = createEmbeddingProvider({ apiKey: 'test-key' });

    const vector = await embed('How do I enrol in the 401k?');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: 'How do I enrol in the 401k?' },
      undefined,
    );
  });

  it('throws ProviderError on an empty response', async () => {
    mockEmbeddingsCreate.mockResolvedValue({ data: [] });
    const embed = createEmbeddingProvider({ apiKey: 'test-key', model: 'custom-embed' });

    await expect(embed('text')).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('resolveEmbeddingProvider', () => {
  it('returns null when the key is not set', () => {
    expect(
      resolveEmbeddingProvider({ model: 'text-embedding-3-small', apiKeyEnvVar: 'OPENAI_API_KEY' }, {}),
    ).toBeNull();
  });

  it('returns a generator when the key is set', () => {
    const embed = resolveEmbeddingProvider(
      { model: 'text-embedding-3-small', apiKeyEnvVar: 'OPENAI_API_KEY' },
      { OPENAI_API_KEY: 'test-key' },
    );
    expect(typeof embed).toBe('function');
  });
});
