/**
 * Message Catalog
 *
 * User-facing text in Dutch, French and English. Unknown placeholders are
 * left as written.
 */

import catalog from './messages.json';
import type { Language } from '../types';

export type MessageKey = keyof typeof catalog;

export type MessageParams = Record<string, string | number>;

export function getMessage(key: MessageKey, language: Language, params: MessageParams = {}): string {
  const template = catalog[key][language] || catalog[key].nl;

  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in params ? String(params[name]) : placeholder
  );
}
