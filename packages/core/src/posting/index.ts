/**
 * Posting module: postings, flags, metadata and balancing weights.
 */

export { createPosting, isAutoBalancePosting, formatPosting, formatResolvedPosting } from './posting.js';
export type { PostingOptions } from './posting.js';
export { computeWeight } from './weight.js';
export { EMPTY_META, formatMeta, formatMetaValue } from './meta.js';
export type { Meta, MetaValue, Tag, Link } from './meta.js';
export type { Flag, PriceKind, PostingPrice, Posting, ResolvedPrice, ResolvedPosting } from './types.js';
