import { ResourceTags } from './types.js';

export interface TagPair {
  Key: string;
  Value: string;
}

export function toTagList(tags: ResourceTags): TagPair[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}
