import type { TagInspector } from './types';

/**
 * Preferred display text of a member, rendered by `Selector.Tag`.
 */
export class DescriptionTag {
  constructor(readonly text: string) {}
}

/**
 * Marks a member as the canonical name for its value when several members
 * share it.
 */
export class PrimaryTag {
  static readonly instance = new PrimaryTag();

  private constructor() {}
}

export function description(text: string): DescriptionTag {
  return new DescriptionTag(text);
}

export function primary(): PrimaryTag {
  return PrimaryTag.instance;
}

/**
 * Recognises `DescriptionTag` (first one wins) and `PrimaryTag`.
 */
export const defaultTagInspector: TagInspector = {
  preferredText(tags) {
    const index = tags.findIndex((tag) => tag instanceof DescriptionTag);
    if (index < 0) return undefined;
    const tag = tags[index];
    return tag instanceof DescriptionTag ? { index, text: tag.text } : undefined;
  },
  isPrimaryMarker(tags) {
    return tags.some((tag) => tag instanceof PrimaryTag);
  },
};
