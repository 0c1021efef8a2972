import { createRequire } from 'node:module';
import { CONTEXT_LIMITS } from '../constants.js';
import { logger } from './logger.js';

type TiktokenEncoding = {
  encode: (text: string) => ArrayLike<number>;
};

type TiktokenModule = {
  get_encoding?: (encoding: string) => TiktokenEncoding;
};

/**
 * Counts tokens in a serialized string.
 */
export interface TokenCounter {
  readonly mode: 'tiktoken' | 'approx';
  count(text: string): number;
}

let cachedEncoding: TiktokenEncoding | null | undefined;

function loadEncoding(): TiktokenEncoding | null {
  if (cachedEncoding !== undefined) {
    return cachedEncoding;
  }

  const require = createRequire(import.meta.url);

  try {
    const tiktoken: TiktokenModule = require('tiktoken');
    if (!tiktoken.get_encoding) {
      throw new Error('tiktoken does not expose get_encoding');
    }
    cachedEncoding = tiktoken.get_encoding(CONTEXT_LIMITS.TIKTOKEN_ENCODING);
  } catch (error) {
    logger.debug('tiktoken unavailable, using approximate token counts', {
      error: error instanceof Error ? error.message : String(error)
    });
    cachedEncoding = null;
  }

  return cachedEncoding;
}

/**
 * Serialized UTF-8 length divided by four.
 */
export const approxTokenCounter: TokenCounter = {
  mode: 'approx',
  count(text: string): number {
    return Math.floor(Buffer.byteLength(text, 'utf8') / CONTEXT_LIMITS.APPROX_CHARS_PER_TOKEN);
  }
};

/**
 * Tokenizer-accurate counter, or null when tiktoken cannot be loaded.
 */
export function getTiktokenCounter(): TokenCounter | null {
  const encoding = loadEncoding();
  if (!encoding) {
    return null;
  }

  return {
    mode: 'tiktoken',
    count(text: string): number {
      return encoding.encode(text).length;
    }
  };
}
