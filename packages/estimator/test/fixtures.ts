import type { Row } from '@logodds/core';

// Two short documents; "the" and "brown" appear once in each.
export const wordCounts: Row[] = [
  { doc: 1, word: 'the', n: 1 },
  { doc: 1, word: 'quick', n: 1 },
  { doc: 1, word: 'brown', n: 1 },
  { doc: 1, word: 'fox', n: 1 },
  { doc: 1, word: 'jumped', n: 2 },
  { doc: 2, word: 'over', n: 1 },
  { doc: 2, word: 'the', n: 1 },
  { doc: 2, word: 'lazy', n: 1 },
  { doc: 2, word: 'brown', n: 1 },
  { doc: 2, word: 'dog', n: 2 }
];

// Rows whose word only occurs in their own document
export const distinctiveRows = [1, 3, 4, 5, 7, 9];
export const sharedRows = [0, 2, 6, 8];
