import { FilterSyntaxError } from '../errors';
import { Token, TokenKind, tokenizeFilter } from './lexer';

export type IntSet = { kind: 'range'; from: number; to: number } | { kind: 'values'; values: number[] };

export type FilterNode =
  | { kind: 'and'; operands: FilterNode[] }
  | { kind: 'or'; operands: FilterNode[] }
  | { kind: 'not'; operand: FilterNode }
  | { kind: 'type'; name: string; sizes?: IntSet }
  | { kind: 'sizes'; sizes: IntSet }
  | { kind: 'package'; label: string; lines?: IntSet }
  | { kind: 'file'; name: string; lines?: IntSet }
  | { kind: 'pattern'; source: string; flags: string; lines?: IntSet }
  | { kind: 'function'; name: string }
  | { kind: 'all' };

export const intSetHas = (set: IntSet, value: number): boolean =>
  set.kind === 'range' ? value >= set.from && value <= set.to : set.values.includes(value);

class FilterParser {
  private position = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[],
  ) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const trailing = this.peek();
    if (trailing.kind !== 'end') {
      this.fail(`Unexpected '${trailing.text}'`, trailing);
    }
    return node;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.position + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    this.position += 1;
    return token;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.next();
    if (token.kind !== kind) {
      this.fail(`Expected ${description} but found ${token.kind === 'end' ? 'end of input' : `'${token.text}'`}`, token);
    }
    return token;
  }

  private fail(message: string, token: Token): never {
    throw new FilterSyntaxError(message, this.expression, token.column);
  }

  private parseOr(): FilterNode {
    const operands = [this.parseAnd()];
    while (this.peek().kind === 'or') {
      this.next();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'or', operands };
  }

  private parseAnd(): FilterNode {
    const operands = [this.parseUnary()];
    while (this.peek().kind === 'and') {
      this.next();
      operands.push(this.parseUnary());
    }
    return operands.length === 1 ? operands[0] : { kind: 'and', operands };
  }

  private parseUnary(): FilterNode {
    if (this.peek().kind === 'not') {
      this.next();
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FilterNode {
    const token = this.peek();

    switch (token.kind) {
      case 'lparen': {
        this.next();
        const inner = this.parseOr();
        this.expect('rparen', "')'");
        return inner;
      }
      case 'colon': {
        this.next();
        const name = this.next();
        if (name.kind !== 'ident' && name.kind !== 'string') {
          this.fail("Expected a function name after ':'", name);
        }
        return this.rejectSet({ kind: 'function', name: name.text });
      }
      case 'star':
        this.next();
        return this.rejectSet({ kind: 'all' });
      case 'int':
      case 'lbracket':
        return this.rejectSet({ kind: 'sizes', sizes: this.parseIntSet() });
      case 'ident':
        this.next();
        return { kind: 'type', name: token.text, sizes: this.parseOptionalSet() };
      case 'string': {
        this.next();
        const lines = this.parseOptionalSet();
        return token.text.startsWith('@')
          ? { kind: 'package', label: token.text, lines }
          : { kind: 'file', name: token.text, lines };
      }
      case 'regex': {
        this.next();
        const flags = token.flags ?? '';
        try {
          new RegExp(token.text, flags);
        } catch (error) {
          this.fail(`Invalid regular expression: ${(error as Error).message}`, token);
        }
        return { kind: 'pattern', source: token.text, flags, lines: this.parseOptionalSet() };
      }
      case 'end':
        return this.fail('Unexpected end of filter', token);
      default:
        return this.fail(`Unexpected '${token.text}'`, token);
    }
  }

  private parseOptionalSet(): IntSet | undefined {
    if (this.peek().kind !== 'colon') {
      return undefined;
    }
    this.next();
    return this.parseIntSet();
  }

  private rejectSet(node: FilterNode): FilterNode {
    const token = this.peek();
    if (token.kind === 'colon') {
      this.fail(`A ${node.kind} filter cannot take a size or line set`, token);
    }
    return node;
  }

  private parseInteger(): number {
    return Number.parseInt(this.expect('int', 'an integer').text, 10);
  }

  private parseIntSet(): IntSet {
    const token = this.peek();

    if (token.kind === 'lbracket') {
      this.next();
      const values = [this.parseInteger()];
      while (this.peek().kind === 'comma') {
        this.next();
        values.push(this.parseInteger());
      }
      this.expect('rbracket', "']'");
      return { kind: 'values', values };
    }

    const from = this.parseInteger();
    if (this.peek().kind !== 'colon' || this.peek(1).kind !== 'int') {
      return { kind: 'values', values: [from] };
    }
    this.next();
    const to = this.parseInteger();
    if (to < from) {
      this.fail(`Empty range ${from}:${to}`, token);
    }
    return { kind: 'range', from, to };
  }
}

export const parseFilter = (expression: string): FilterNode =>
  new FilterParser(expression, tokenizeFilter(expression)).parse();

const describeIntSet = (set: IntSet | undefined): string => {
  if (!set) {
    return '';
  }
  if (set.kind === 'range') {
    return `:${set.from}:${set.to}`;
  }
  return set.values.length === 1 ? `:${set.values[0]}` : `:[${set.values.join(', ')}]`;
};

/** Prints a parsed filter back in normalized form. */
export const describeFilter = (node: FilterNode): string => {
  const wrap = (child: FilterNode): string =>
    child.kind === 'and' || child.kind === 'or' ? `(${describeFilter(child)})` : describeFilter(child);

  switch (node.kind) {
    case 'and':
      return node.operands.map(wrap).join(' && ');
    case 'or':
      return node.operands.map((operand) => (operand.kind === 'or' ? `(${describeFilter(operand)})` : describeFilter(operand))).join(' || ');
    case 'not':
      return `!${wrap(node.operand)}`;
    case 'type':
      return `${node.name}${describeIntSet(node.sizes)}`;
    case 'sizes':
      return describeIntSet(node.sizes).slice(1);
    case 'package':
      return `${JSON.stringify(node.label)}${describeIntSet(node.lines)}`;
    case 'file':
      return `${JSON.stringify(node.name)}${describeIntSet(node.lines)}`;
    case 'pattern':
      return `/${node.source}/${node.flags}${describeIntSet(node.lines)}`;
    case 'function':
      return /^[A-Za-z_$][\w$.]*$/.test(node.name) ? `:${node.name}` : `:${JSON.stringify(node.name)}`;
    case 'all':
      return '*';
  }
};
