/**
 * Quote identity.
 *
 * Wraps either a non-negative integer or a non-blank string. Ids compare by
 * their string form, so `Id.from(7)` equals `Id.from('7')`.
 */

import { invalidArgument, isNonBlank, nullOrEmpty } from '../errors.js';

export type IdLike = Id | string | number;

export class Id {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
    Object.freeze(this);
  }

  /**
   * Create an id from a number, a string or an existing id
   */
  static from(value: IdLike): Id {
    if (value instanceof Id) {
      return value;
    }

    if (typeof value === 'number') {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw invalidArgument('id', 'must be a non-negative integer');
      }
      return new Id(value.toString());
    }

    if (!isNonBlank(value)) {
      throw nullOrEmpty('id');
    }

    return new Id(value);
  }

  static isId(value: unknown): value is Id {
    return value instanceof Id;
  }

  equals(other: IdLike | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    if (other instanceof Id) {
      return other.value === this.value;
    }
    return String(other) === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/**
 * The map key used for an id-like value
 */
export function idKey(id: IdLike): string {
  return Id.from(id).value;
}
