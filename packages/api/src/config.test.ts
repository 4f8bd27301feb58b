import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { TEST_ENV } from './test/fakes';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(TEST_ENV);

    expect(config.retrieval).toEqual({
      requiredVersion: 'v1',
      topK: 5,
      minScore: 0.35,
      candidatePool: 50,
      dimensions: 3,
      timeoutMs: 20000,
    });
    expect(config.context.maxContextChars).toBe(6000);
    expect(config.context.instructionSignatures).toEqual([
      'ignore previous',
      'system:',
      'assistant:',
      'you are an ai',
    ]);
    expect(config.gateway).toEqual({ apiKey: undefined, maxQuestionChars: 2000 });
    expect(config.embedding.provider).toBe('ollama');
    expect(config.llm.provider).toBe('ollama');
    expect(config.redis).toEqual({ url: undefined, ttlSeconds: 86400, timeoutMs: 500 });
  });

  it('returns a frozen object', () => {
    const config = loadConfig(TEST_ENV);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retrieval)).toBe(true);
  });

  it('requires DOC_VERSION', () => {
    const { DOC_VERSION: _omit, ...env } = TEST_ENV;
    expect(() => loadConfig(env)).toThrow(/DOC_VERSION/);
  });

  it('rejects a blank DOC_VERSION', () => {
    expect(() => loadConfig({ ...TEST_ENV, DOC_VERSION: '   ' })).toThrow(/DOC_VERSION/);
  });

  it('requires DATABASE_URL', () => {
    const { DATABASE_URL: _omit, ...env } = TEST_ENV;
    expect(() => loadConfig(env)).toThrow(/DATABASE_URL/);
  });

  it('derives the candidate pool from TOP_K', () => {
    expect(loadConfig({ ...TEST_ENV, TOP_K: '8' }).retrieval.candidatePool).toBe(80);
  });

  it('rejects a candidate pool that is not larger than TOP_K', () => {
    expect(() => loadConfig({ ...TEST_ENV, TOP_K: '5', CANDIDATE_POOL: '5' })).toThrow(
      /CANDIDATE_POOL \(5\) must be larger than TOP_K \(5\)/
    );
  });

  it('parses and lowercases instruction signatures', () => {
    const config = loadConfig({ ...TEST_ENV, INSTRUCTION_SIGNATURES: 'Ignore Previous, SYSTEM:,, ' });
    expect(config.context.instructionSignatures).toEqual(['ignore previous', 'system:']);
  });

  it('treats an empty API_KEY as no credential', () => {
    expect(loadConfig({ ...TEST_ENV, API_KEY: '' }).gateway.apiKey).toBeUndefined();
    expect(loadConfig({ ...TEST_ENV, API_KEY: 'test-secret' }).gateway.apiKey).toBe('test-secret');
  });

  it('requires provider keys for hosted providers', () => {
    expect(() => loadConfig({ ...TEST_ENV, LLM_PROVIDER: 'groq' })).toThrow(/GROQ_API_KEY/);
    expect(() => loadConfig({ ...TEST_ENV, EMBEDDING_PROVIDER: 'openai' })).toThrow(/OPENAI_API_KEY/);
  });

  it('rejects non-numeric limits', () => {
    expect(() => loadConfig({ ...TEST_ENV, MAX_CONTEXT_CHARS: 'lots' })).toThrow(/MAX_CONTEXT_CHARS/);
  });
});
