import {
  buildPrimitive,
  defaultCanvas,
  defaultGradient,
  defaultShadow,
  defaultStyle,
  defaultTransform,
  isPrimitiveKind,
  resolveTier,
  type ArrowDirection,
  type EdgeStyle,
  type Gradient,
  type GraphEdge,
  type GraphLayout,
  type GraphNode,
  type GraphProps,
  type LayoutDirection,
  type NodeShape,
  type PrimitiveKind,
  type RawProps,
  type SceneAst,
  type Shadow,
  type Shape,
  type Statement,
  type Style,
  type Transform,
} from './ast.js';
import { diagnostic, ErrorCode, type Diagnostic, type RecoveryAction, type Severity } from './errors.js';
import {
  describeToken,
  isLiteralToken,
  literalOf,
  literalText,
  type Literal,
  type LiteralKind,
  type Pair,
  type Position,
  type Token,
  type VarToken,
} from './tokens.js';

export interface ParseResult {
  ast: SceneAst;
  errors: Diagnostic[];
  /** Bindings in effect at the end of the document. */
  variables: ReadonlyMap<string, Literal>;
}

type ShapeBase = Pick<Shape, 'style' | 'transform' | 'children' | 'line' | 'column'>;

type TextKind = 'string' | 'color' | 'ident';

const COMMANDS = ['canvas', 'group', 'stack', 'row', 'graph', 'rect', 'circle', 'ellipse', 'line', 'path', 'polygon', 'text', 'image'];

const GRAPH_LAYOUTS: readonly GraphLayout[] = ['hierarchical', 'grid', 'manual'];
const NODE_SHAPES: readonly NodeShape[] = ['rect', 'circle', 'ellipse', 'diamond'];
const EDGE_STYLES: readonly EdgeStyle[] = ['straight', 'curved', 'orthogonal'];
const ARROWS: readonly ArrowDirection[] = ['none', 'forward', 'backward', 'both'];
const DIRECTIONS: readonly LayoutDirection[] = ['vertical', 'horizontal'];

function oneOf<T extends string>(options: readonly T[], word: string): T | undefined {
  return options.find(option => option === word);
}

function isTextKind(kind: LiteralKind): kind is TextKind {
  return kind === 'string' || kind === 'color' || kind === 'ident';
}

function editDistance(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }
  return prev[b.length];
}

export function suggestCommand(word: string): string | undefined {
  const lower = word.toLowerCase();
  let best: string | undefined;
  let bestDistance = 3;
  for (const command of COMMANDS) {
    const distance = editDistance(lower, command);
    if (distance < bestDistance) {
      best = command;
      bestDistance = distance;
    }
  }
  return best === undefined ? undefined : `Did you mean '${best}'?`;
}

/**
 * Recursive-descent parser over a token stream. Always produces an AST;
 * problems are collected as diagnostics with the recovery that was applied.
 */
export class Parser {
  private pos = 0;
  private readonly variables = new Map<string, Literal>();
  private readonly errors: Diagnostic[] = [];
  private readonly end: Token;

  constructor(private readonly tokens: readonly Token[]) {
    const last = tokens[tokens.length - 1];
    this.end = { kind: 'eof', line: last?.line ?? 1, column: last?.column ?? 1 };
  }

  parse(): ParseResult {
    const statements: Statement[] = [];
    while (this.peek().kind !== 'eof') {
      const statement = this.parseStatement();
      if (statement) statements.push(statement);
    }
    return { ast: { statements }, errors: this.errors, variables: this.variables };
  }

  // Token cursor

  private peek(offset = 0): Token {
    const token = this.tokens[this.pos + offset];
    return token === undefined || token.kind === 'eof' ? this.end : token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  private atStatementEnd(): boolean {
    const kind = this.peek().kind;
    return kind === 'newline' || kind === 'eof' || kind === 'indent' || kind === 'dedent';
  }

  private peekWord(word: string): boolean {
    const token = this.peek();
    return token.kind === 'ident' && token.value === word;
  }

  private record(
    code: ErrorCode,
    message: string,
    at: Position,
    recovery: RecoveryAction,
    severity: Severity = 'error',
    context?: string,
  ): void {
    this.errors.push(diagnostic(code, message, at, { severity, recovery, context }));
  }

  // Values

  private undefinedVar(token: VarToken): void {
    this.record(ErrorCode.ParseUndefinedVar, `Undefined variable: $${token.name}`, token, 'passThroughLiteral');
  }

  /**
   * Consumes the current token when it is (or a variable bound to) one of
   * `kinds`. An unbound variable is consumed and reported; it satisfies a
   * text request as its literal `$name`.
   */
  private take(kinds: readonly LiteralKind[]): Literal | undefined {
    const token = this.peek();
    if (isLiteralToken(token)) {
      if (!kinds.includes(token.kind)) return undefined;
      this.advance();
      return literalOf(token);
    }
    if (token.kind !== 'var') return undefined;

    const bound = this.variables.get(token.name);
    if (bound === undefined) {
      this.advance();
      this.undefinedVar(token);
      const textKind = kinds.find(isTextKind);
      return textKind === undefined ? undefined : { kind: textKind, value: `$${token.name}` };
    }
    if (!kinds.includes(bound.kind)) return undefined;
    this.advance();
    return bound;
  }

  private takeNumber(): number | undefined {
    const literal = this.take(['number']);
    return literal?.kind === 'number' ? literal.value : undefined;
  }

  private takePair(): Pair | undefined {
    const literal = this.take(['pair']);
    return literal?.kind === 'pair' ? literal.value : undefined;
  }

  private takeString(): string | undefined {
    const literal = this.take(['string']);
    return literal?.kind === 'string' ? literal.value : undefined;
  }

  private takeColor(allowIdent: boolean): string | undefined {
    const literal = this.take(allowIdent ? ['color', 'ident'] : ['color']);
    return literal === undefined ? undefined : literalText(literal);
  }

  private takeWord<T extends string>(options: readonly T[]): T | undefined {
    const token = this.peek();
    if (token.kind !== 'ident') return undefined;
    const word = oneOf(options, token.value);
    if (word !== undefined) this.advance();
    return word;
  }

  // Statements

  private parseStatement(): Statement | null {
    const token = this.peek();
    switch (token.kind) {
      case 'var':
        return this.parseAssignment(token);
      case 'ident':
        return this.parseCommand(token.value, token);
      case 'newline':
      case 'indent':
      case 'dedent':
        this.advance();
        return null;
      default:
        this.record(
          ErrorCode.ParseUnexpectedToken,
          `Expected a command, found ${describeToken(token)}`,
          token,
          'resumeAtNextToken',
        );
        this.advance();
        return null;
    }
  }

  private parseAssignment(token: VarToken): Statement | null {
    this.advance();
    const next = this.peek();
    if (next.kind !== 'equals') {
      this.record(ErrorCode.ParseMissingEquals, `Expected '=' after $${token.name}`, next, 'resumeAtNextToken');
      return null;
    }
    this.advance();

    const valueToken = this.peek();
    let value: Literal | undefined;
    if (isLiteralToken(valueToken)) {
      value = literalOf(valueToken);
      this.advance();
    } else if (valueToken.kind === 'var') {
      value = this.take(['number', 'string', 'pair', 'color', 'ident']);
    } else {
      this.record(ErrorCode.ParseEmptyValue, `Missing value for $${token.name}`, valueToken, 'resumeAtNextToken');
      this.advance();
      return null;
    }

    if (value !== undefined) this.variables.set(token.name, value);
    return { type: 'variable', name: token.name, value, line: token.line };
  }

  private parseCommand(word: string, token: Token): Statement | null {
    if (word === 'canvas') return this.parseCanvas(token);

    const shape = this.parseShape(word, token);
    if (shape) return { type: 'shape', shape };

    this.advance();
    this.record(
      ErrorCode.ParseUnknownCommand,
      `Unknown command: '${word}'`,
      token,
      'skip',
      'error',
      suggestCommand(word),
    );
    this.skipStatement();
    return null;
  }

  /** Drops the rest of the line and any block indented under it. */
  private skipStatement(): void {
    while (!this.atStatementEnd()) this.advance();
    if (!this.enterBlock()) return;
    let depth = 1;
    while (depth > 0 && this.peek().kind !== 'eof') {
      const kind = this.advance().kind;
      if (kind === 'indent') depth++;
      if (kind === 'dedent') depth--;
    }
  }

  private parseCanvas(token: Token): Statement {
    this.advance();
    const canvas = defaultCanvas();

    while (!this.atStatementEnd()) {
      const current = this.peek();
      if (current.kind === 'ident' && current.value === 'fill') {
        this.advance();
        const fill = this.takeColor(true);
        if (fill === undefined) {
          this.record(ErrorCode.ParseExpectedColor, 'Expected a color after fill', this.peek(), 'skip');
        } else {
          canvas.fill = fill;
        }
        continue;
      }

      const tier = current.kind === 'ident' ? resolveTier(current.value) : undefined;
      this.advance();
      if (tier) {
        canvas.tier = tier;
      } else if (current.kind === 'pair') {
        this.record(
          ErrorCode.ParseInvalidProperty,
          'Raw pixel dimensions are not supported; use a size tier',
          current,
          'skip',
        );
      } else {
        this.record(
          ErrorCode.ParseInvalidProperty,
          `Unknown canvas property: ${describeToken(current)}`,
          current,
          'skip',
          'warning',
        );
      }
    }
    return { type: 'canvas', canvas, line: token.line };
  }

  // Shapes

  private newBase(at: Position): ShapeBase {
    return { style: defaultStyle(), transform: defaultTransform(), children: [], line: at.line, column: at.column };
  }

  /** Parses a shape statement when `word` is a shape keyword; leaves the cursor alone otherwise. */
  private parseShape(word: string, token: Token): Shape | undefined {
    if (isPrimitiveKind(word)) return this.parsePrimitive(word, token);
    switch (word) {
      case 'group':
        return this.parseGroup(token);
      case 'stack':
      case 'row':
        return this.parseLayout(word === 'stack' ? 'vertical' : 'horizontal', token);
      case 'graph':
        return this.parseGraph(token);
      default:
        return undefined;
    }
  }

  private parsePrimitive(kind: PrimitiveKind, token: Token): Shape {
    this.advance();
    const raw: RawProps = {};
    const base = this.newBase(token);

    this.parseInlineProps(kind, raw);
    if (this.enterBlock()) this.parseBlock(base, raw);
    if (raw.fill !== undefined && base.style.fill === undefined) base.style.fill = raw.fill;

    return buildPrimitive(kind, raw, base);
  }

  private parseInlineProps(kind: PrimitiveKind, raw: RawProps): void {
    while (!this.atStatementEnd()) {
      const token = this.peek();
      switch (token.kind) {
        case 'lbracket':
          if (kind === 'polygon') {
            raw.points = this.parsePoints();
          } else {
            this.advance();
          }
          break;
        case 'ident':
          this.advance();
          this.parseLabeled(raw, token.value);
          break;
        case 'var': {
          this.advance();
          const bound = this.variables.get(token.name);
          if (bound === undefined) {
            this.undefinedVar(token);
            if (raw.fill === undefined) raw.fill = `$${token.name}`;
          } else if (raw.fill === undefined) {
            raw.fill = literalText(bound);
          }
          break;
        }
        case 'number':
        case 'string':
        case 'pair':
        case 'color':
          this.advance();
          this.placeLiteral(kind, raw, literalOf(token));
          break;
        default:
          this.advance();
      }
    }
  }

  /** Positional inference for an unlabeled value. */
  private placeLiteral(kind: PrimitiveKind, raw: RawProps, literal: Literal): void {
    switch (literal.kind) {
      case 'pair':
        if (raw.at === undefined) raw.at = literal.value;
        else if (raw.size === undefined) raw.size = literal.value;
        break;
      case 'number':
        if (kind === 'circle' && raw.radius === undefined) raw.radius = literal.value;
        else if (raw.width === undefined) raw.width = literal.value;
        break;
      case 'string':
        raw.content = literal.value;
        break;
      case 'color':
      case 'ident':
        if (raw.fill === undefined) raw.fill = literal.value;
        break;
    }
  }

  private parseLabeled(raw: RawProps, word: string): void {
    switch (word) {
      case 'at':
      case 'size':
      case 'from':
      case 'to': {
        const pair = this.takePair();
        if (pair) raw[word] = pair;
        break;
      }
      case 'radius': {
        const radius = this.takeNumber();
        if (radius !== undefined) raw.radius = radius;
        break;
      }
      case 'd':
      case 'href': {
        const text = this.takeString();
        if (text !== undefined) raw[word] = text;
        break;
      }
      case 'points':
        if (this.peek().kind === 'lbracket') raw.points = this.parsePoints();
        break;
    }
  }

  /** Consumes `newline* indent` when a block follows the current line. */
  private enterBlock(): boolean {
    let offset = 0;
    while (this.peek(offset).kind === 'newline') offset++;
    if (this.peek(offset).kind !== 'indent') return false;
    this.pos += offset + 1;
    return true;
  }

  /**
   * Runs `handle` over the tokens of a block until its closing dedent.
   * Deeper indentation that no child claims is flattened into the block.
   * `handle` must consume at least one token.
   */
  private eachInBlock(handle: (token: Token) => void): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      switch (token.kind) {
        case 'eof':
          return;
        case 'dedent':
          this.advance();
          if (depth === 0) return;
          depth--;
          break;
        case 'indent':
          this.advance();
          depth++;
          break;
        case 'newline':
          this.advance();
          break;
        default:
          handle(token);
      }
    }
  }

  private parseBlock(base: ShapeBase, raw: RawProps): void {
    this.eachInBlock(token => {
      if (token.kind !== 'ident') {
        this.advance();
        return;
      }
      const child = this.parseShape(token.value, token);
      if (child) {
        base.children.push(child);
        return;
      }
      this.advance();
      this.parseBlockProperty(token.value, base, raw);
    });
  }

  private parseBlockProperty(word: string, base: ShapeBase, raw: RawProps): void {
    if (this.parseStyleProperty(word, base.style)) return;
    if (this.parseTextProperty(word, base.style)) return;
    if (this.parseTransformProperty(word, base.transform)) return;

    switch (word) {
      case 'width': {
        const width = this.takeNumber();
        if (width !== undefined) base.style.strokeWidth = width;
        break;
      }
      case 'd': {
        const d = this.takeString();
        if (d !== undefined) raw.d = d;
        break;
      }
      case 'points':
        if (this.peek().kind === 'lbracket') raw.points = this.parsePoints();
        break;
      // Unrecognized block keys are ignored.
    }
  }

  private expected(code: ErrorCode, property: string, what: string): void {
    const token = this.peek();
    this.record(code, `Expected ${what} after ${property}, found ${describeToken(token)}`, token, 'skip');
  }

  private parseStyleProperty(word: string, style: Style): boolean {
    switch (word) {
      case 'fill': {
        const fill = this.takeColor(true);
        if (fill === undefined) this.expected(ErrorCode.ParseExpectedColor, 'fill', 'a color');
        else style.fill = fill;
        return true;
      }
      case 'stroke': {
        const stroke = this.takeColor(false);
        if (stroke === undefined) this.expected(ErrorCode.ParseExpectedColor, 'stroke', 'a color');
        else style.stroke = stroke;

        let width = this.takeNumber();
        if (width === undefined && this.peekWord('width')) {
          this.advance();
          width = this.takeNumber();
        }
        if (width !== undefined) style.strokeWidth = width;
        return true;
      }
      case 'opacity':
      case 'corner': {
        const value = this.takeNumber();
        if (value === undefined) this.expected(ErrorCode.ParseExpectedNumber, word, 'a number');
        else style[word] = value;
        return true;
      }
      case 'shadow':
        style.shadow = this.parseShadow();
        return true;
      case 'gradient':
        style.gradient = this.parseGradient();
        return true;
      default:
        return false;
    }
  }

  private parseTextProperty(word: string, style: Style): boolean {
    switch (word) {
      case 'font': {
        const family = this.takeString();
        if (family !== undefined) style.font = family;
        const size = this.takeNumber();
        if (size !== undefined) style.fontSize = size;
        return true;
      }
      case 'bold':
      case 'italic':
        style.fontWeight = word;
        return true;
      case 'center':
      case 'middle':
        style.textAnchor = 'middle';
        return true;
      case 'end':
        style.textAnchor = 'end';
        return true;
      default:
        return false;
    }
  }

  private parseTransformProperty(word: string, transform: Transform): boolean {
    switch (word) {
      case 'translate':
      case 'origin': {
        const pair = this.takePair();
        if (pair === undefined) this.expected(ErrorCode.ParseExpectedPair, word, 'a coordinate pair');
        else transform[word] = pair;
        return true;
      }
      case 'rotate': {
        const angle = this.takeNumber();
        if (angle === undefined) this.expected(ErrorCode.ParseExpectedNumber, word, 'a number');
        else transform.rotate = angle;
        return true;
      }
      case 'scale': {
        const literal = this.take(['pair', 'number']);
        if (literal?.kind === 'pair') transform.scale = literal.value;
        else if (literal?.kind === 'number') transform.scale = [literal.value, literal.value];
        else this.expected(ErrorCode.ParseExpectedValue, word, 'a scale factor');
        return true;
      }
      default:
        return false;
    }
  }

  private parseShadow(): Shadow {
    const shadow = defaultShadow();
    const offset = this.takePair();
    if (offset) {
      shadow.x = offset[0];
      shadow.y = offset[1];
    }
    const blur = this.takeNumber();
    if (blur !== undefined) shadow.blur = blur;
    const color = this.takeColor(false);
    if (color !== undefined) shadow.color = color;
    return shadow;
  }

  private parseGradient(): Gradient {
    const gradient = defaultGradient();
    let typed = false;
    let colors = 0;

    for (;;) {
      const token = this.peek();
      if (token.kind === 'ident') {
        this.advance();
        if ((token.value === 'linear' || token.value === 'radial') && !typed) {
          gradient.type = token.value;
          typed = true;
        } else if (token.value === 'from' || token.value === 'to') {
          const color = this.takeColor(false);
          if (color !== undefined) {
            gradient[token.value] = color;
            colors = token.value === 'from' ? Math.max(colors, 1) : 2;
          }
        }
      } else if (token.kind === 'color') {
        this.advance();
        if (colors === 0) gradient.from = token.value;
        else if (colors === 1) gradient.to = token.value;
        colors++;
      } else if (token.kind === 'number') {
        this.advance();
        gradient.angle = token.value;
      } else {
        return gradient;
      }
    }
  }

  /** `[` pair* `]`; an unterminated list keeps the points read so far. */
  private parsePoints(): Pair[] {
    this.advance();
    const points: Pair[] = [];
    let resumeAt = -1;

    for (;;) {
      const token = this.peek();
      if (token.kind === 'rbracket') {
        this.advance();
        return points;
      }
      if (token.kind === 'newline' || token.kind === 'indent') {
        if (resumeAt < 0) resumeAt = this.pos;
        this.advance();
        continue;
      }
      const before = this.pos;
      const pair = token.kind === 'pair' || token.kind === 'var' ? this.takePair() : undefined;
      if (pair) {
        points.push(pair);
        resumeAt = -1;
        continue;
      }
      if (this.pos !== before) continue;

      this.record(ErrorCode.ParseMissingBracket, "Expected ']' to close the point list", token, 'skip');
      // Hand back any line breaks so the next statement starts cleanly.
      if (resumeAt >= 0) this.pos = resumeAt;
      return points;
    }
  }

  private parseGroup(token: Token): Shape {
    this.advance();
    const base = this.newBase(token);
    const name = this.takeString();
    while (!this.atStatementEnd()) this.advance();
    if (this.enterBlock()) this.parseBlock(base, {});
    return { ...base, kind: 'group', props: { name } };
  }

  private parseLayout(direction: LayoutDirection, token: Token): Shape {
    this.advance();
    const base = this.newBase(token);
    const props: { direction: LayoutDirection; gap: number; at?: Pair } = { direction, gap: 0 };

    while (!this.atStatementEnd()) {
      const current = this.advance();
      if (current.kind !== 'ident') continue;
      const override = oneOf(DIRECTIONS, current.value);
      if (override) {
        props.direction = override;
      } else if (current.value === 'gap') {
        const gap = this.takeNumber();
        if (gap !== undefined) props.gap = gap;
      } else if (current.value === 'at') {
        const at = this.takePair();
        if (at) props.at = at;
      }
    }

    if (this.enterBlock()) this.parseBlock(base, {});
    return { ...base, kind: 'layout', props };
  }

  // Graphs

  private applyGraphWord(props: GraphProps, word: string): boolean {
    const layout = oneOf(GRAPH_LAYOUTS, word);
    if (layout) {
      props.layout = layout;
      return true;
    }
    const direction = oneOf(DIRECTIONS, word);
    if (direction) {
      props.direction = direction;
      return true;
    }
    switch (word) {
      case 'spacing': {
        const spacing = this.takeNumber();
        if (spacing !== undefined) props.spacing = spacing;
        return true;
      }
      case 'layout': {
        const next = this.peek();
        const named = this.takeWord(GRAPH_LAYOUTS);
        if (named) {
          props.layout = named;
        } else if (next.kind === 'ident') {
          this.advance();
          this.record(ErrorCode.ParseInvalidProperty, `Unsupported graph layout '${next.value}'`, next, 'skip', 'warning');
        }
        return true;
      }
      case 'direction': {
        const named = this.takeWord(DIRECTIONS);
        if (named) props.direction = named;
        return true;
      }
      default:
        return false;
    }
  }

  private parseGraph(token: Token): Shape {
    this.advance();
    const base = this.newBase(token);
    const props: GraphProps = { layout: 'manual', direction: 'vertical', spacing: 50, nodes: [], edges: [] };

    while (!this.atStatementEnd()) {
      const current = this.advance();
      if (current.kind === 'ident') this.applyGraphWord(props, current.value);
    }

    if (this.enterBlock()) {
      this.eachInBlock(current => {
        this.advance();
        if (current.kind !== 'ident') return;
        switch (current.value) {
          case 'node':
            this.parseNode(props);
            return;
          case 'edge':
            this.parseEdge(props);
            return;
        }
        if (this.applyGraphWord(props, current.value)) return;
        if (this.parseStyleProperty(current.value, base.style)) return;
        this.parseTransformProperty(current.value, base.transform);
      });
    }

    return { ...base, kind: 'graph', props };
  }

  private parseNode(props: GraphProps): void {
    const id = this.takeString();
    if (id === undefined) {
      this.expected(ErrorCode.ParseExpectedString, 'node', 'a quoted node id');
      this.skipStatement();
      return;
    }

    const node: GraphNode = { id, shape: 'rect', style: defaultStyle() };
    const handle = (current: Token): void => {
      if (current.kind === 'ident') {
        this.advance();
        this.applyNodeWord(node, current.value);
        return;
      }
      if (current.kind === 'pair') {
        this.advance();
        if (node.at === undefined) node.at = current.value;
        else if (node.size === undefined) node.size = current.value;
        return;
      }
      if (current.kind === 'color' || current.kind === 'var') {
        const fill = this.takeColor(false);
        if (fill !== undefined) {
          if (node.style.fill === undefined) node.style.fill = fill;
          return;
        }
      }
      this.advance();
    };

    while (!this.atStatementEnd()) handle(this.peek());
    if (this.enterBlock()) this.eachInBlock(handle);
    props.nodes.push(node);
  }

  private applyNodeWord(node: GraphNode, word: string): void {
    switch (word) {
      case 'at':
      case 'size': {
        const pair = this.takePair();
        if (pair) node[word] = pair;
        return;
      }
      case 'shape': {
        const shape = this.takeWord(NODE_SHAPES);
        if (shape) node.shape = shape;
        return;
      }
      case 'label': {
        const label = this.takeString();
        if (label !== undefined) node.label = label;
        return;
      }
      default:
        this.parseStyleProperty(word, node.style);
    }
  }

  private parseEdge(props: GraphProps): void {
    const from = this.takeString();
    const arrow = from === undefined ? undefined : this.peek();
    if (arrow?.kind === 'arrow') this.advance();
    const to = arrow?.kind === 'arrow' ? this.takeString() : undefined;
    if (from === undefined || to === undefined) {
      this.expected(ErrorCode.ParseExpectedString, 'edge', `a quoted node id${from === undefined ? '' : " after '->'"}`);
      this.skipStatement();
      return;
    }

    const edge: GraphEdge = { from, to, style: 'straight', arrow: 'forward', stroke: '#333', strokeWidth: 2 };
    const handle = (current: Token): void => {
      if (current.kind === 'ident') {
        this.advance();
        this.applyEdgeWord(edge, current.value);
        return;
      }
      if (current.kind === 'number') {
        this.advance();
        edge.strokeWidth = current.value;
        return;
      }
      if (current.kind === 'color' || current.kind === 'var') {
        const stroke = this.takeColor(false);
        if (stroke !== undefined) {
          edge.stroke = stroke;
          return;
        }
      }
      this.advance();
    };

    while (!this.atStatementEnd()) handle(this.peek());
    if (this.enterBlock()) this.eachInBlock(handle);
    props.edges.push(edge);
  }

  private applyEdgeWord(edge: GraphEdge, word: string): void {
    const style = oneOf(EDGE_STYLES, word);
    if (style) {
      edge.style = style;
      return;
    }
    const arrow = oneOf(ARROWS, word);
    if (arrow) {
      edge.arrow = arrow;
      return;
    }
    switch (word) {
      case 'style': {
        const named = this.takeWord(EDGE_STYLES);
        if (named) edge.style = named;
        return;
      }
      case 'arrow': {
        const named = this.takeWord(ARROWS);
        if (named) edge.arrow = named;
        return;
      }
      case 'label': {
        const label = this.takeString();
        if (label !== undefined) edge.label = label;
        return;
      }
      case 'stroke': {
        const stroke = this.takeColor(false);
        if (stroke !== undefined) edge.stroke = stroke;
        const width = this.takeNumber();
        if (width !== undefined) edge.strokeWidth = width;
        return;
      }
      case 'width': {
        const width = this.takeNumber();
        if (width !== undefined) edge.strokeWidth = width;
        return;
      }
    }
  }
}

export function parse(tokens: readonly Token[]): ParseResult {
  return new Parser(tokens).parse();
}
