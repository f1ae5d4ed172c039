/**
 * Common quote representation.
 *
 * Every provider maps its DTOs onto something that satisfies IQuote; the
 * cache and the generators only ever see this shape.
 */

import { Id, type IdLike } from './id.js';
import { invalidArgument, isNonBlank, nullArgument, nullOrEmpty } from '../errors.js';

export interface IQuote {
  readonly id: Id;
  /** Quote text */
  readonly value: string;
  readonly author: string;
  /** When the quote was said or written, if known */
  readonly date: Date | null;
  /** Link, file name or free text; may be empty */
  readonly source: string;
  readonly tags: readonly string[];
}

export interface QuoteInit {
  id: IdLike;
  value: string;
  author: string;
  source?: string | null;
  date?: Date | null;
  tags?: readonly string[] | null;
}

export const UNKNOWN_AUTHOR = 'Unknown';

export class Quote implements IQuote {
  readonly id: Id;
  readonly value: string;
  readonly author: string;
  readonly date: Date | null;
  readonly source: string;
  readonly tags: readonly string[];

  constructor(init: QuoteInit) {
    if (!init) {
      throw nullArgument('init');
    }
    if (!isNonBlank(init.value)) {
      throw nullOrEmpty('value');
    }
    if (!isNonBlank(init.author)) {
      throw nullOrEmpty('author');
    }
    if (init.date && Number.isNaN(init.date.getTime())) {
      throw invalidArgument('date', 'must be a valid date');
    }

    this.id = Id.from(init.id);
    this.value = init.value;
    this.author = init.author;
    this.source = init.source ?? '';
    this.date = init.date ? new Date(init.date.getTime()) : null;
    this.tags = Object.freeze([...(init.tags ?? [])]);

    // subclasses add their own fields, then freeze
    if (new.target === Quote) {
      Object.freeze(this);
    }
  }

  /**
   * Placeholder returned when nothing matched a lookup
   */
  static unknown(id: IdLike = 'unknown'): Quote {
    return new Quote({ id, value: 'No Content', author: UNKNOWN_AUTHOR, source: '', tags: [] });
  }

  /**
   * Copy with some fields replaced; the result is validated like any new quote
   */
  with(changes: Partial<QuoteInit>): Quote {
    return new Quote({
      id: this.id,
      value: this.value,
      author: this.author,
      source: this.source,
      date: this.date,
      tags: this.tags,
      ...changes,
    });
  }

  hasTag(tag: string): boolean {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }
    return this.tags.includes(tag);
  }

  equals(other: IQuote | null | undefined): boolean {
    return other !== null && other !== undefined && quoteEquals(this, other);
  }

  toString(): string {
    return `"${this.value}" - ${this.author}`;
  }
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Value equality used for duplicate detection, independent of identity
 */
export interface EqualityComparer<T> {
  equals(a: T, b: T): boolean;
  hash(value: T): number;
}

function sameDate(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.getTime() === b.getTime();
}

/**
 * Full structural equality over every IQuote field
 */
export function quoteEquals(a: IQuote, b: IQuote): boolean {
  return (
    a.id.equals(b.id) &&
    a.value === b.value &&
    a.author === b.author &&
    a.source === b.source &&
    sameDate(a.date, b.date) &&
    a.tags.length === b.tags.length &&
    a.tags.every((tag, i) => tag === b.tags[i])
  );
}

function hashString(hash: number, text: string): number {
  let h = hash;
  for (let i = 0; i < text.length; i++) {
    h = (Math.imul(h, 31) + text.charCodeAt(i)) | 0;
  }
  // field separator so ["ab", "c"] and ["a", "bc"] differ
  return (Math.imul(h, 31) + 0x1f) | 0;
}

export function quoteHash(quote: IQuote): number {
  let h = 17;
  h = hashString(h, quote.id.value);
  h = hashString(h, quote.value);
  h = hashString(h, quote.author);
  h = hashString(h, quote.source);
  h = hashString(h, quote.date ? quote.date.toISOString() : '');
  for (const tag of quote.tags) {
    h = hashString(h, tag);
  }
  return h;
}

export const structuralComparer: EqualityComparer<IQuote> = {
  equals: quoteEquals,
  hash: quoteHash,
};
