import type { Pair, Token } from './tokens.js';

type Matcher = (text: string, line: number, column: number) => Token | null;

interface Rule {
  pattern: RegExp;
  build: Matcher | null;
}

const COMMENT_MARKER = '//';

function pairFrom(text: string): Pair {
  const [a, b] = text.includes('x') ? text.split('x') : text.split(',');
  return [parseFloat(a), parseFloat(b)];
}

// Priority order matters: pairs before numbers, colors before anything starting with '#'.
const RULES: Rule[] = [
  { pattern: /\/\/.*/y, build: null },
  { pattern: /\$[A-Za-z_]\w*/y, build: (text, line, column) => ({ kind: 'var', name: text.slice(1), line, column }) },
  {
    pattern: /#(?:[0-9a-fA-F]{8}|[0-9a-fA-F]{6}|[0-9a-fA-F]{4}|[0-9a-fA-F]{3})(?!\w)/y,
    build: (text, line, column) => ({ kind: 'color', value: text, line, column }),
  },
  {
    pattern: /-?\d+(?:\.\d+)?[,x]-?\d+(?:\.\d+)?/y,
    build: (text, line, column) => ({ kind: 'pair', value: pairFrom(text), line, column }),
  },
  { pattern: /"[^"]*"|'[^']*'/y, build: (text, line, column) => ({ kind: 'string', value: text.slice(1, -1), line, column }) },
  { pattern: /-?\d+(?:\.\d+)?/y, build: (text, line, column) => ({ kind: 'number', value: parseFloat(text), line, column }) },
  { pattern: /->/y, build: (_, line, column) => ({ kind: 'arrow', line, column }) },
  { pattern: /:/y, build: (_, line, column) => ({ kind: 'colon', line, column }) },
  { pattern: /=/y, build: (_, line, column) => ({ kind: 'equals', line, column }) },
  { pattern: /\[/y, build: (_, line, column) => ({ kind: 'lbracket', line, column }) },
  { pattern: /\]/y, build: (_, line, column) => ({ kind: 'rbracket', line, column }) },
  { pattern: /[A-Za-z_][A-Za-z0-9_-]*/y, build: (text, line, column) => ({ kind: 'ident', value: text, line, column }) },
];

function isSkippedLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith(COMMENT_MARKER);
}

function scanLine(text: string, lineNo: number, start: number, out: Token[]): void {
  let pos = start;
  while (pos < text.length) {
    const ch = text[pos];
    if (ch === ' ' || ch === '\t') {
      pos++;
      continue;
    }

    let matched = false;
    for (const rule of RULES) {
      rule.pattern.lastIndex = pos;
      const m = rule.pattern.exec(text);
      if (!m) continue;

      const token = rule.build?.(m[0], lineNo, pos + 1) ?? null;
      if (token) out.push(token);
      pos += m[0].length;
      matched = true;
      break;
    }

    // Unrecognized characters are dropped.
    if (!matched) pos++;
  }
}

/**
 * Converts source into tokens. Indentation becomes explicit `indent`/`dedent`
 * markers, every non-blank non-comment line ends with `newline`, and the
 * stream always ends with `eof`. Never throws.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const indents: number[] = [0];
  const lines = source.split(/\r?\n/);

  lines.forEach((text, index) => {
    if (isSkippedLine(text)) return;
    const lineNo = index + 1;
    const width = text.length - text.trimStart().length;

    if (width > indents[indents.length - 1]) {
      indents.push(width);
      tokens.push({ kind: 'indent', line: lineNo, column: 1 });
    } else {
      // A width between two levels stops at the lower one without complaint.
      while (indents.length > 1 && width < indents[indents.length - 1]) {
        indents.pop();
        tokens.push({ kind: 'dedent', line: lineNo, column: 1 });
      }
    }

    scanLine(text, lineNo, width, tokens);
    tokens.push({ kind: 'newline', line: lineNo, column: text.length + 1 });
  });

  const lastLine = lines.length;
  while (indents.length > 1) {
    indents.pop();
    tokens.push({ kind: 'dedent', line: lastLine, column: 1 });
  }
  tokens.push({ kind: 'eof', line: lastLine, column: 1 });
  return tokens;
}
