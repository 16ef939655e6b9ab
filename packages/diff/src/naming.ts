/**
 * Naming utilities
 * Maps resource names to file- and URL-safe tokens
 */

import { EncodingUnsupportedError } from './errors.js';

const SAFE_CHAR = /^[A-Za-z0-9._~-]$/;
const SAFE_NAME = /^[A-Za-z0-9._~-]*$/;

const utf8 = new TextEncoder();

/**
 * Percent-encode every character outside `[A-Za-z0-9._~-]`, one `%XX`
 * triplet per UTF-8 byte, uppercase hex
 *
 * e.g. "Café" becomes "Caf%C3%A9", "Main menu" becomes "Main%20menu"
 *
 * Lone surrogates have no UTF-8 form and would all encode as U+FFFD;
 * callers reject them first (see hasLoneSurrogate).
 */
export function encodeName(name: string): string {
  if (isSafeName(name)) return name;

  let token = '';
  for (const char of name) {
    if (SAFE_CHAR.test(char)) {
      token += char;
      continue;
    }
    for (const byte of utf8.encode(char)) {
      token += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return token;
}

/**
 * Check if a name passes through encodeName unchanged
 */
export function isSafeName(name: string): boolean {
  return SAFE_NAME.test(name);
}

export function hasLoneSurrogate(name: string): boolean {
  return /\p{Cs}/u.test(name);
}

/**
 * Companion content file for a resource, e.g. `queue_Sales.json`
 */
export function contentFileName(prefix: string, name: string): string {
  return `${prefix}_${encodeName(name)}.json`;
}

// =============================================================================
// Encoding precondition
// =============================================================================

export const REFERENCE_CHARACTER = 'é';
export const REFERENCE_TOKEN = '%C3%A9';

export interface EncodingCheckOptions {
  env?: NodeJS.ProcessEnv;
  encoder?: (name: string) => string;
}

export interface EncodingCheck {
  supported: boolean;
  reason?: string;
}

/**
 * Charset named by the effective locale (LC_ALL, then LC_CTYPE, then LANG),
 * e.g. "UTF-8" for "en_GB.UTF-8". Null when no charset is named.
 */
export function localeCharset(env: NodeJS.ProcessEnv): string | null {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG;
  if (!locale) return null;

  const dot = locale.indexOf('.');
  if (dot === -1) return null;

  const charset = locale.slice(dot + 1).split('@')[0];
  return charset || null;
}

function isUtf8(charset: string): boolean {
  return charset.toLowerCase().replace(/[^a-z0-9]/g, '') === 'utf8';
}

/**
 * Probe the encoder with the reference character and inspect the locale
 */
export function checkEncodingSupport(options: EncodingCheckOptions = {}): EncodingCheck {
  const env = options.env ?? process.env;
  const encoder = options.encoder ?? encodeName;

  const charset = localeCharset(env);
  if (charset !== null && !isUtf8(charset)) {
    return { supported: false, reason: `locale charset is ${charset}, expected UTF-8` };
  }

  const token = encoder(REFERENCE_CHARACTER);
  if (token !== REFERENCE_TOKEN) {
    return {
      supported: false,
      reason: `"${REFERENCE_CHARACTER}" encodes to ${token}, expected ${REFERENCE_TOKEN}`,
    };
  }

  return { supported: true };
}

/**
 * Startup precondition. Throws EncodingUnsupportedError unless the host
 * encodes the reference character correctly or the caller allows it.
 */
export function assertEncodingSupport(
  options: EncodingCheckOptions & { allowUnsupported?: boolean } = {}
): EncodingCheck {
  const check = checkEncodingSupport(options);
  if (!check.supported && !options.allowUnsupported) {
    throw new EncodingUnsupportedError(check.reason ?? 'unknown reason');
  }
  return check;
}
