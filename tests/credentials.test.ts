/**
 * Tests for the token check
 */

import { describe, it, expect } from 'vitest';
import { checkTokens, findMissingCredentials } from '../src/credentials.js';

describe('checkTokens', () => {
  const complete = {
    apiToken: 'test-api-token',
    botToken: 'test-bot-token',
    chatId: '424242',
  };

  it('should accept a complete set of credentials', () => {
    expect(checkTokens(complete)).toBe(true);
  });

  it('should reject an empty value', () => {
    expect(checkTokens({ ...complete, chatId: '' })).toBe(false);
  });

  it('should reject an absent value', () => {
    expect(checkTokens({ apiToken: 'test-api-token', botToken: 'test-bot-token' })).toBe(false);
  });

  it('should name every missing variable', () => {
    expect(findMissingCredentials({ apiToken: 'test-api-token' })).toEqual([
      'TELEGRAM_TOKEN',
      'TELEGRAM_CHAT_ID',
    ]);
    expect(findMissingCredentials({})).toEqual([
      'PRACTICUM_TOKEN',
      'TELEGRAM_TOKEN',
      'TELEGRAM_CHAT_ID',
    ]);
    expect(findMissingCredentials(complete)).toEqual([]);
  });
});
