/**
 * Core constants for seqtree data structures
 */

import type { Empty } from './types';

// Shared empty node; carries no owner so it is never edited
export const EMPTY: Empty = Object.freeze({ kind: 'empty' });

// Rope chunk merge threshold, in UTF-8 bytes
export const CHUNK_SIZE = 4096;
