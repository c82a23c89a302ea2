/**
 * Tests for memsift error types and factories
 */

import { describe, it, expect } from 'vitest';
import {
  MemsiftError,
  MemsiftErrorCodes,
  ProviderCallError,
  UnknownProviderError,
  NoProviderAvailableError,
  isMemsiftError,
  errorMessage,
} from './errors.js';

describe('MemsiftErrorCodes', () => {
  it('should have all error codes defined', () => {
    expect(MemsiftErrorCodes.CONFIG).toBe('MEMSIFT_ERR_CONFIG');
    expect(MemsiftErrorCodes.VALIDATION).toBe('MEMSIFT_ERR_VALIDATION');
    expect(MemsiftErrorCodes.UNKNOWN_PROVIDER).toBe('MEMSIFT_ERR_UNKNOWN_PROVIDER');
    expect(MemsiftErrorCodes.PROVIDER_CALL).toBe('MEMSIFT_ERR_PROVIDER_CALL');
    expect(MemsiftErrorCodes.NO_PROVIDER).toBe('MEMSIFT_ERR_NO_PROVIDER');
  });
});

describe('MemsiftError', () => {
  it('should create error with all properties', () => {
    const error = new MemsiftError({
      code: MemsiftErrorCodes.VALIDATION,
      message: 'Invalid input',
      component: 'config',
      details: { field: 'filter.providers' },
      timestamp: '2024-01-15T10:30:00.000Z',
    });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MemsiftError);
    expect(error.name).toBe('MemsiftError');
    expect(error.code).toBe('MEMSIFT_ERR_VALIDATION');
    expect(error.message).toBe('Invalid input');
    expect(error.component).toBe('config');
    expect(error.details).toEqual({ field: 'filter.providers' });
    expect(error.timestamp).toBe('2024-01-15T10:30:00.000Z');
  });

  it('should preserve cause when provided', () => {
    const cause = new Error('Original error');
    const error = new MemsiftError({
      code: MemsiftErrorCodes.CONFIG,
      message: 'Wrapped error',
      component: 'filter',
      timestamp: '2024-01-15T10:30:00.000Z',
      cause,
    });

    expect(error.cause).toBe(cause);
  });

  it('should convert to JSON correctly', () => {
    const error = new MemsiftError({
      code: MemsiftErrorCodes.CONFIG,
      message: 'Missing section',
      component: 'config',
      details: { section: 'filter' },
      timestamp: '2024-01-15T10:30:00.000Z',
    });

    expect(error.toJSON()).toEqual({
      code: 'MEMSIFT_ERR_CONFIG',
      message: 'Missing section',
      component: 'config',
      details: { section: 'filter' },
      timestamp: '2024-01-15T10:30:00.000Z',
    });
  });

  it('should convert to string correctly', () => {
    const error = new MemsiftError({
      code: MemsiftErrorCodes.CONFIG,
      message: 'Missing configuration',
      component: 'config',
      timestamp: '2024-01-15T10:30:00.000Z',
    });

    expect(error.toString()).toBe('[MEMSIFT_ERR_CONFIG] Missing configuration (component: config)');
  });
});

describe('ProviderCallError', () => {
  it('should carry kind, provider and status', () => {
    const error = new ProviderCallError('Rate limit exceeded', 'rate_limit', {
      provider: 'openai',
      status: 429,
    });

    expect(error).toBeInstanceOf(MemsiftError);
    expect(error.name).toBe('ProviderCallError');
    expect(error.code).toBe(MemsiftErrorCodes.PROVIDER_CALL);
    expect(error.component).toBe('provider:openai');
    expect(error.kind).toBe('rate_limit');
    expect(error.provider).toBe('openai');
    expect(error.status).toBe(429);
    expect(error.details).toEqual({ kind: 'rate_limit', provider: 'openai', status: 429 });
  });

  it('should mark transient kinds as retryable', () => {
    expect(new ProviderCallError('x', 'rate_limit', { provider: 'p' }).retryable).toBe(true);
    expect(new ProviderCallError('x', 'unavailable', { provider: 'p' }).retryable).toBe(true);
    expect(new ProviderCallError('x', 'network', { provider: 'p' }).retryable).toBe(true);
    expect(new ProviderCallError('x', 'auth', { provider: 'p' }).retryable).toBe(false);
    expect(new ProviderCallError('x', 'invalid_response', { provider: 'p' }).retryable).toBe(false);
    expect(new ProviderCallError('x', 'not_configured', { provider: 'p' }).retryable).toBe(false);
  });
});

describe('UnknownProviderError', () => {
  it('should name the unsupported provider', () => {
    const error = new UnknownProviderError('gemini', ['openai', 'anthropic']);

    expect(error.name).toBe('UnknownProviderError');
    expect(error.code).toBe(MemsiftErrorCodes.UNKNOWN_PROVIDER);
    expect(error.message).toBe('Unknown provider: gemini');
    expect(error.providerName).toBe('gemini');
    expect(error.details).toEqual({ provider: 'gemini', supported: ['openai', 'anthropic'] });
  });
});

describe('NoProviderAvailableError', () => {
  it('should record the session and attempted providers', () => {
    const error = new NoProviderAvailableError('sess-1', ['openai', 'anthropic']);

    expect(error.name).toBe('NoProviderAvailableError');
    expect(error.code).toBe(MemsiftErrorCodes.NO_PROVIDER);
    expect(error.message).toBe('No available LLM providers for filter session');
    expect(error.sessionId).toBe('sess-1');
    expect(error.details).toEqual({ sessionId: 'sess-1', attempted: ['openai', 'anthropic'] });
  });
});

describe('Error Utilities', () => {
  describe('isMemsiftError', () => {
    it('should recognise memsift errors and subclasses', () => {
      expect(isMemsiftError(new UnknownProviderError('gemini', []))).toBe(true);
      expect(isMemsiftError(new NoProviderAvailableError('s', []))).toBe(true);
      expect(isMemsiftError(new Error('plain'))).toBe(false);
      expect(isMemsiftError('string')).toBe(false);
    });
  });

  describe('errorMessage', () => {
    it('should read the message of errors and stringify the rest', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain text')).toBe('plain text');
      expect(errorMessage(undefined)).toBe('undefined');
    });
  });
});
