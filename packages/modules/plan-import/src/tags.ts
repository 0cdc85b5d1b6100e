import { ITEM_TAGS, ITEM_TAG_CODES, CORRECTABLE_TAGS } from './types';
import type { ItemTag, CorrectableTag } from './types';

const BY_CODE = new Map<string, ItemTag>(
  ITEM_TAGS.filter((t) => ITEM_TAG_CODES[t] !== '').map((t) => [ITEM_TAG_CODES[t].toLowerCase(), t]),
);

export function isItemTag(value: string): value is ItemTag {
  return (ITEM_TAGS as readonly string[]).includes(value);
}

export function isCorrectableTag(value: string): value is CorrectableTag {
  return (CORRECTABLE_TAGS as readonly string[]).includes(value);
}

/**
 * Accepts tag names in any case ("Recurring") or short codes ("R", "IN").
 * Returns null for anything unrecognised.
 */
export function parseItemTag(raw: string): ItemTag | null {
  const value = raw.trim().toLowerCase();
  if (isItemTag(value)) return value;
  return BY_CODE.get(value) ?? null;
}

export function parseCorrectableTag(raw: string): CorrectableTag | null {
  const tag = parseItemTag(raw);
  return tag !== null && isCorrectableTag(tag) ? tag : null;
}

export function toTagCode(tag: ItemTag): string {
  return ITEM_TAG_CODES[tag];
}
