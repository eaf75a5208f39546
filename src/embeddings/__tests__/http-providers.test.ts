/**
 * HTTP Embedding Provider Tests
 */

import { IndexConfigurationError } from '../../errors';
import { OllamaEmbeddingProvider, OpenAIEmbeddingProvider } from '../http-providers';

const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const createFetch = (...responses: Array<Response | Error>) => {
  const queue = [...responses];
  return jest.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) throw new Error('Unexpected fetch call');
    if (next instanceof Error) throw next;
    return next;
  });
};

const requestBody = (fetchImpl: ReturnType<typeof createFetch>, call: number = 0): unknown =>
  JSON.parse(String(fetchImpl.mock.calls[call][1]?.body));

describe('OllamaEmbeddingProvider', () => {
  const config = { baseUrl: 'http://localhost:11434/', model: 'all-minilm', dimension: 3 };

  it('should post the normalized prompt and return the vector', async () => {
    const fetchImpl = createFetch(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    const vector = await provider.embed('  hello   world ');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://localhost:11434/api/embeddings');
    expect(requestBody(fetchImpl)).toEqual({ model: 'all-minilm', prompt: 'hello world' });
  });

  it('should embed batches one prompt at a time', async () => {
    const fetchImpl = createFetch(jsonResponse({ embedding: [1, 0, 0] }), jsonResponse({ embedding: [0, 1, 0] }));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    const vectors = await provider.embedBatch(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should report a failed status as a backend failure', async () => {
    const fetchImpl = createFetch(jsonResponse({ error: 'model not found' }, 404));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embed('hello')).rejects.toMatchObject({
      kind: 'ProviderError',
      code: 'BACKEND_FAILURE',
      message: 'Embedding request failed with status 404',
    });
  });

  it('should report a network error as a backend failure', async () => {
    const fetchImpl = createFetch(new Error('connect ECONNREFUSED'));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embed('hello')).rejects.toMatchObject({
      code: 'BACKEND_FAILURE',
      message: 'Embedding request failed: connect ECONNREFUSED',
    });
  });

  it('should reject a vector of the wrong dimension', async () => {
    const fetchImpl = createFetch(jsonResponse({ embedding: [0.1, 0.2] }));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    const error = await provider.embed('hello').catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(IndexConfigurationError);
    expect(error).toMatchObject({
      code: 'DIMENSION_MISMATCH',
      message: 'Embedding model all-minilm returned 2 dimensions, expected 3',
    });
  });

  it('should reject a zero vector', async () => {
    const fetchImpl = createFetch(jsonResponse({ embedding: [0, 0, 0] }));
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embed('hello')).rejects.toMatchObject({ code: 'ZERO_VECTOR' });
  });

  it('should reject empty input without calling the backend', async () => {
    const fetchImpl = createFetch();
    const provider = new OllamaEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embed(' \n ')).rejects.toMatchObject({ code: 'EMPTY_INPUT' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('OpenAIEmbeddingProvider', () => {
  const config = {
    baseUrl: 'https://api.example.com/v1',
    model: 'text-embedding-3-small',
    dimension: 2,
    apiKey: 'test-secret',
  };

  it('should send the batch with a bearer token', async () => {
    const fetchImpl = createFetch(jsonResponse({ data: [{ index: 0, embedding: [1, 0] }] }));
    const provider = new OpenAIEmbeddingProvider({ ...config, fetchImpl });

    await provider.embed('hello');

    expect(fetchImpl.mock.calls[0][0]).toBe('https://api.example.com/v1/embeddings');
    expect(fetchImpl.mock.calls[0][1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(requestBody(fetchImpl)).toEqual({ model: 'text-embedding-3-small', input: ['hello'] });
  });

  it('should order results by their index', async () => {
    const fetchImpl = createFetch(
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );
    const provider = new OpenAIEmbeddingProvider({ ...config, fetchImpl });

    expect(await provider.embedBatch(['first', 'second'])).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('should reject duplicate indexes', async () => {
    const fetchImpl = createFetch(
      jsonResponse({
        data: [
          { index: 0, embedding: [1, 0] },
          { index: 0, embedding: [0, 1] },
        ],
      })
    );
    const provider = new OpenAIEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embedBatch(['first', 'second'])).rejects.toMatchObject({
      message: 'Embedding item has invalid index 0',
    });
  });

  it('should reject a response with the wrong number of items', async () => {
    const fetchImpl = createFetch(jsonResponse({ data: [{ index: 0, embedding: [1, 0] }] }));
    const provider = new OpenAIEmbeddingProvider({ ...config, fetchImpl });

    await expect(provider.embedBatch(['first', 'second'])).rejects.toMatchObject({
      code: 'BACKEND_FAILURE',
      message: 'Malformed embedding response',
    });
  });

  it('should not call the backend for an empty batch', async () => {
    const fetchImpl = createFetch();
    const provider = new OpenAIEmbeddingProvider({ ...config, fetchImpl });

    expect(await provider.embedBatch([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
