import entityAliases from '../config/entity-aliases.json';
import { cleanText } from './text.util';

const ALIAS_TO_CANONICAL = buildAliasIndex(entityAliases);

function buildAliasIndex(
  aliases: Record<string, string[]>,
): Map<string, string> {
  const index = new Map<string, string>();
  for (const [canonical, variants] of Object.entries(aliases)) {
    index.set(canonical.toLowerCase(), canonical);
    for (const variant of variants) {
      index.set(variant.toLowerCase(), canonical);
    }
  }
  return index;
}

/**
 * Maps ticker and spelling variants ("$BTC", "btc", "XBT") onto one canonical
 * entity name. Unknown names are only trimmed.
 */
export function normalizeEntityName(value: string): string {
  const cleaned = cleanText(value);
  if (!cleaned) {
    return '';
  }
  return ALIAS_TO_CANONICAL.get(cleaned.toLowerCase()) ?? cleaned;
}

export function entityKey(value: string): string {
  return normalizeEntityName(value).toLowerCase();
}

export function isListedEntity(value: string, list: string[]): boolean {
  const key = entityKey(value);
  if (!key) {
    return false;
  }
  return list.some((entry) => entityKey(entry) === key);
}
