/**
 * @fileoverview Tests for types module utility functions and error classes
 */

import { describe, it, expect } from 'vitest';
import { createInitialState, getErrorMessage, isError } from '../src/types.js';
import {
  ConfigError,
  GenerationError,
  PlaceholderMismatchError,
  PromptCrafterError,
  SchedulerError,
} from '../src/errors.js';

describe('types utility functions', () => {
  describe('createInitialState', () => {
    it('should create an empty state', () => {
      expect(createInitialState()).toEqual({ runs: {}, lastConfigPath: null, lastTemplatePath: null });
    });

    it('should return a new object on every call', () => {
      const first = createInitialState();
      first.runs['x'] = {
        id: 'x',
        startedAt: 0,
        finishedAt: 0,
        status: 'completed',
        model: null,
        outputFile: null,
        placeholders: [],
        cacheHits: 0,
      };

      expect(createInitialState().runs).toEqual({});
    });
  });

  describe('isError', () => {
    it('should accept Error instances and subclasses', () => {
      expect(isError(new Error('a'))).toBe(true);
      expect(isError(new SchedulerError('b'))).toBe(true);
    });

    it('should reject other values', () => {
      expect(isError('error')).toBe(false);
      expect(isError({ message: 'error' })).toBe(false);
      expect(isError(null)).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should use the message of an Error', () => {
      expect(getErrorMessage(new Error('disk full'))).toBe('disk full');
    });

    it('should accept strings and message-bearing objects', () => {
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    });

    it('should fall back for anything else', () => {
      expect(getErrorMessage(42)).toBe('An unknown error occurred');
    });
  });
});

describe('error classes', () => {
  it('should carry a code and the subclass name', () => {
    const err = new ConfigError('CONFIG_INVALID', 'bad config');

    expect(err).toBeInstanceOf(PromptCrafterError);
    expect(err.name).toBe('ConfigError');
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.message).toBe('bad config');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const err = new GenerationError('OpenAI request failed: socket hang up', { cause });

    expect(err.code).toBe('GENERATION_FAILED');
    expect(err.cause).toBe(cause);
  });

  it('should expose both sides of a placeholder mismatch', () => {
    const err = new PlaceholderMismatchError(['mood'], ['subject']);

    expect(err.code).toBe('PLACEHOLDER_MISMATCH');
    expect(err.missingInConfig).toEqual(['mood']);
    expect(err.missingInTemplate).toEqual(['subject']);
  });

  it('should tag scheduler errors', () => {
    expect(new SchedulerError('nope').code).toBe('SCHEDULER_INVALID');
  });
});
