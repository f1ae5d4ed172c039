import { invalidArgument, isNonBlank, nullOrEmpty } from '../../errors.js';

export type TagOperator = 'and' | 'or';

type TagNode =
  | { kind: 'tag'; tag: string }
  | { kind: TagOperator; left: TagExpression; right: TagExpression };

const OPERATOR_CHARS: Record<TagOperator, string> = {
  and: ',',
  or: '|',
};

/**
 * Tag filter in Quotable's query syntax: `a,b` matches quotes tagged with
 * both, `a|b` matches either.
 *
 * Usage:
 *   TagExpression.tag('love').or('wisdom').toString()   // "love|wisdom"
 *   TagExpression.all(['history', 'politics']).toString() // "history,politics"
 */
export class TagExpression {
  private constructor(private readonly node: TagNode) {}

  static tag(tag: string): TagExpression {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }
    const trimmed = tag.trim();
    if (trimmed.includes(OPERATOR_CHARS.and) || trimmed.includes(OPERATOR_CHARS.or)) {
      throw invalidArgument('tag', `cannot contain '${OPERATOR_CHARS.and}' or '${OPERATOR_CHARS.or}'`);
    }
    return new TagExpression({ kind: 'tag', tag: trimmed });
  }

  /** Every tag must match */
  static all(tags: readonly string[]): TagExpression {
    return TagExpression.combine(tags, 'and');
  }

  /** Any tag may match */
  static any(tags: readonly string[]): TagExpression {
    return TagExpression.combine(tags, 'or');
  }

  private static combine(tags: readonly string[], operator: TagOperator): TagExpression {
    if (tags.length === 0) {
      throw nullOrEmpty('tags');
    }
    return tags
      .map((tag) => TagExpression.tag(tag))
      .reduce((left, right) => new TagExpression({ kind: operator, left, right }));
  }

  get isTag(): boolean {
    return this.node.kind === 'tag';
  }

  get operator(): TagOperator | null {
    return this.node.kind === 'tag' ? null : this.node.kind;
  }

  and(other: TagExpression | string): TagExpression {
    return new TagExpression({ kind: 'and', left: this, right: TagExpression.from(other) });
  }

  or(other: TagExpression | string): TagExpression {
    return new TagExpression({ kind: 'or', left: this, right: TagExpression.from(other) });
  }

  static from(value: TagExpression | string): TagExpression {
    return value instanceof TagExpression ? value : TagExpression.tag(value);
  }

  /** Every tag named in the expression, left to right */
  tags(): string[] {
    if (this.node.kind === 'tag') {
      return [this.node.tag];
    }
    return [...this.node.left.tags(), ...this.node.right.tags()];
  }

  toString(): string {
    switch (this.node.kind) {
      case 'tag':
        return this.node.tag;
      case 'and':
      case 'or':
        return `${this.node.left.toString()}${OPERATOR_CHARS[this.node.kind]}${this.node.right.toString()}`;
    }
  }
}
