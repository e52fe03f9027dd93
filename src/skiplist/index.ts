export { SkipList } from './SkipList.js';
export { SkipListNode, SkipListHead } from './SkipListNode.js';
export type { SkipListLinks } from './SkipListNode.js';
export { SkipListIterator, ConstSkipListIterator } from './SkipListIterator.js';
export { MAX_LEVEL, LEVEL_PROBABILITY, randomLevel, naturalCompare } from './utils.js';
