/**
 * Session Type Guards Tests
 * Unit tests for runtime guards applied to cached session data
 */

import { describe, it, expect } from 'vitest';
import { isStrategy, isSessionRecord, isRetrieveRequest } from '../guards.js';

describe('isStrategy', () => {
  it('should return true for known strategies', () => {
    expect(isStrategy('local')).toBe(true);
    expect(isStrategy('web')).toBe(true);
    expect(isStrategy('both')).toBe(true);
  });

  it('should return false for anything else', () => {
    expect(isStrategy('custom')).toBe(false);
    expect(isStrategy('LOCAL')).toBe(false);
    expect(isStrategy('')).toBe(false);
    expect(isStrategy(null)).toBe(false);
    expect(isStrategy(1)).toBe(false);
  });
});

describe('isSessionRecord', () => {
  const validRecord = {
    timestamp: '2026-03-01T10:00:00.000Z',
    query: 'what is our refund policy?',
    strategyUsed: 'local',
    documentCount: 2,
    reasoning: 'internal policy question',
    keyPoints: ['From policies.pdf: Refunds are issued within 14 days'],
  };

  it('should accept a valid record', () => {
    expect(isSessionRecord(validRecord)).toBe(true);
  });

  it('should accept a record with no key points', () => {
    expect(isSessionRecord({ ...validRecord, documentCount: 0, keyPoints: [] })).toBe(true);
  });

  it('should reject an unknown strategy', () => {
    expect(isSessionRecord({ ...validRecord, strategyUsed: 'custom' })).toBe(false);
  });

  it('should reject negative or fractional document counts', () => {
    expect(isSessionRecord({ ...validRecord, documentCount: -1 })).toBe(false);
    expect(isSessionRecord({ ...validRecord, documentCount: 1.5 })).toBe(false);
  });

  it('should reject non-string key points', () => {
    expect(isSessionRecord({ ...validRecord, keyPoints: ['ok', 3] })).toBe(false);
  });

  it('should reject missing fields', () => {
    const { reasoning: _reasoning, ...withoutReasoning } = validRecord;
    expect(isSessionRecord(withoutReasoning)).toBe(false);
  });

  it('should reject non-objects', () => {
    expect(isSessionRecord(null)).toBe(false);
    expect(isSessionRecord('record')).toBe(false);
    expect(isSessionRecord(undefined)).toBe(false);
  });
});

describe('isRetrieveRequest', () => {
  it('should accept query and userId strings', () => {
    expect(isRetrieveRequest({ query: 'q', userId: 'u' })).toBe(true);
  });

  it('should reject missing or mistyped fields', () => {
    expect(isRetrieveRequest({ query: 'q' })).toBe(false);
    expect(isRetrieveRequest({ query: 1, userId: 'u' })).toBe(false);
    expect(isRetrieveRequest(null)).toBe(false);
  });
});
