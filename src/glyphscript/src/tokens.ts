export type Pair = readonly [number, number];

export type Literal =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'pair'; readonly value: Pair }
  | { readonly kind: 'color'; readonly value: string }
  | { readonly kind: 'ident'; readonly value: string };

export type LiteralKind = Literal['kind'];

export type StructuralKind =
  | 'indent'
  | 'dedent'
  | 'newline'
  | 'eof'
  | 'lbracket'
  | 'rbracket'
  | 'colon'
  | 'equals'
  | 'arrow';

export interface Position {
  readonly line: number;
  readonly column: number;
}

/** A variable reference; `name` excludes the leading `$`. */
export interface VarToken extends Position {
  readonly kind: 'var';
  readonly name: string;
}

export interface StructuralToken extends Position {
  readonly kind: StructuralKind;
}

export type LiteralToken = Literal & Position;

export type Token = LiteralToken | VarToken | StructuralToken;

export type TokenKind = Token['kind'];

const LITERAL_KINDS: ReadonlySet<TokenKind> = new Set(['number', 'string', 'pair', 'color', 'ident']);

export function isLiteralToken(token: Token): token is LiteralToken {
  return LITERAL_KINDS.has(token.kind);
}

export function literalOf(token: LiteralToken): Literal {
  switch (token.kind) {
    case 'number':
      return { kind: 'number', value: token.value };
    case 'pair':
      return { kind: 'pair', value: token.value };
    case 'string':
      return { kind: 'string', value: token.value };
    case 'color':
      return { kind: 'color', value: token.value };
    case 'ident':
      return { kind: 'ident', value: token.value };
  }
}

/** Textual form used when a literal lands in a string-valued property. */
export function literalText(literal: Literal): string {
  switch (literal.kind) {
    case 'number':
      return String(literal.value);
    case 'pair':
      return `${literal.value[0]},${literal.value[1]}`;
    default:
      return literal.value;
  }
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'var':
      return `variable $${token.name}`;
    case 'number':
    case 'string':
    case 'color':
    case 'ident':
      return `${token.kind} '${token.value}'`;
    case 'pair':
      return `pair '${token.value[0]},${token.value[1]}'`;
    case 'eof':
      return 'end of input';
    default:
      return token.kind;
  }
}
