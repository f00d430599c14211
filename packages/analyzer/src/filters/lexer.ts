import { FilterSyntaxError } from '../errors';

export type TokenKind =
  | 'and'
  | 'or'
  | 'not'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'colon'
  | 'star'
  | 'int'
  | 'string'
  | 'regex'
  | 'ident'
  | 'end';

export interface Token {
  kind: TokenKind;
  text: string;
  column: number;
  /** Regex flags for `regex` tokens. */
  flags?: string;
}

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[\w$.]/;
const DIGIT = /[0-9]/;

const PUNCTUATION: Record<string, TokenKind> = {
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ',': 'comma',
  ':': 'colon',
  '*': 'star',
  '!': 'not',
};

const readQuoted = (input: string, start: number): { text: string; next: number } => {
  const quote = input[start];
  let text = '';
  let index = start + 1;

  while (index < input.length) {
    const char = input[index];
    if (char === '\\' && index + 1 < input.length) {
      text += input[index + 1];
      index += 2;
      continue;
    }
    if (char === quote) {
      return { text, next: index + 1 };
    }
    text += char;
    index += 1;
  }

  throw new FilterSyntaxError('Unterminated string', input, start);
};

const readRegex = (input: string, start: number): { text: string; flags: string; next: number } => {
  let text = '';
  let index = start + 1;

  while (index < input.length && input[index] !== '/') {
    if (input[index] === '\\' && index + 1 < input.length) {
      text += input.slice(index, index + 2);
      index += 2;
      continue;
    }
    text += input[index];
    index += 1;
  }

  if (index >= input.length) {
    throw new FilterSyntaxError('Unterminated regular expression', input, start);
  }

  index += 1;
  let flags = '';
  while (index < input.length && /[a-z]/.test(input[index])) {
    flags += input[index];
    index += 1;
  }
  return { text, flags, next: index };
};

export const tokenizeFilter = (input: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < input.length) {
    const char = input[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    const pair = input.slice(index, index + 2);
    if (pair === '&&' || pair === '||') {
      tokens.push({ kind: pair === '&&' ? 'and' : 'or', text: pair, column: index });
      index += 2;
      continue;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      tokens.push({ kind: punctuation, text: char, column: index });
      index += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const { text, next } = readQuoted(input, index);
      tokens.push({ kind: 'string', text, column: index });
      index = next;
      continue;
    }

    if (char === '/') {
      const { text, flags, next } = readRegex(input, index);
      tokens.push({ kind: 'regex', text, flags, column: index });
      index = next;
      continue;
    }

    if (DIGIT.test(char)) {
      let end = index;
      while (end < input.length && DIGIT.test(input[end])) {
        end += 1;
      }
      tokens.push({ kind: 'int', text: input.slice(index, end), column: index });
      index = end;
      continue;
    }

    if (IDENT_START.test(char)) {
      let end = index + 1;
      while (end < input.length && IDENT_PART.test(input[end])) {
        end += 1;
      }
      tokens.push({ kind: 'ident', text: input.slice(index, end), column: index });
      index = end;
      continue;
    }

    throw new FilterSyntaxError(`Unexpected character '${char}'`, input, index);
  }

  tokens.push({ kind: 'end', text: '', column: input.length });
  return tokens;
};
