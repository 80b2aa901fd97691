import { describe, expect, it } from 'vitest';
import { CANVAS_TIERS } from './ast.js';
import { ErrorCode, toRecord } from './errors.js';
import { evaluate, parseSource, render, renderAst, renderWithErrors } from './pipeline.js';

const head = (size: number, fill = '#fff') =>
  `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}"><rect width="100%" height="100%" fill="${fill}"/>`;

const sample = [
  '// dashboard tile',
  'canvas large fill #0d1117',
  '$accent = #58a6ff',
  'group "card"',
  '  rect at 8,8 size 80x40 $accent',
  '    corner 6',
  '    shadow 0,2 4 #0006',
  '  text "Builds" at 16,32',
  '    font "Inter" 12',
  '    bold',
  'stack gap 4 at 8,56',
  '  circle radius 6',
  '    gradient #fff #000 45',
  '  circle radius 6',
  'graph hierarchical spacing 10',
  '  node "ci" label "CI"',
  '  node "cd" label "CD"',
  '  edge "ci" -> "cd" curved',
].join('\n');

describe('render', () => {
  it('sizes the document from the canvas tier', () => {
    expect(render('canvas giant fill #1a1a2e')).toBe(`${head(512, '#1a1a2e')}</svg>`);
    for (const [tier, size] of Object.entries(CANVAS_TIERS)) {
      expect(render(`canvas ${tier}`).startsWith(head(size))).toBe(true);
    }
  });

  it('writes rectangle geometry verbatim', () => {
    for (const [x, y, w, h] of [[10, 10, 100, 50], [-20, -30, 5, 5], [0, 0, 1000, 0.25]]) {
      expect(render(`rect at ${x},${y} size ${w}x${h}`)).toBe(
        `${head(64)}<rect x="${x}" y="${y}" width="${w}" height="${h}"/></svg>`,
      );
    }
  });

  it('is deterministic', () => {
    const first = render(sample);
    expect(first.startsWith(head(96, '#0d1117'))).toBe(true);
    expect(render(sample)).toBe(first);
  });

  it('always returns a document', () => {
    for (const source of ['', '\n\n', '[[[ ]]]', '$', 'polygon [', 'graph\n  edge "a" -> ', '\u0000\u0001']) {
      expect(render(source)).toMatch(/^<svg xmlns="http:\/\/www\.w3\.org\/2000\/svg" .*<\/svg>$/);
    }
  });
});

describe('renderWithErrors', () => {
  it('renders nothing for an unknown command but still returns a document', () => {
    const { svg, errors } = renderWithErrors('unknown_shape at 50,50');
    expect(svg).toBe(`${head(64)}</svg>`);
    expect(errors.map(toRecord)).toEqual([
      {
        code: ErrorCode.ParseUnknownCommand,
        category: 'parser',
        message: "Unknown command: 'unknown_shape'",
        line: 1,
        column: 1,
        severity: 'error',
      },
    ]);
  });

  it('returns errors alongside the best-effort output', () => {
    const { svg, errors } = renderWithErrors('rect size 5x5\n  fill 7\ncircle 3');
    expect(errors.map(e => e.code)).toEqual([ErrorCode.ParseExpectedColor]);
    expect(svg).toBe(`${head(64)}<rect x="0" y="0" width="5" height="5"/><circle cx="0" cy="0" r="3"/></svg>`);
  });
});

describe('evaluate', () => {
  it('passes an undefined variable through as the fill', () => {
    const { scene, errors } = evaluate('rect $undefined');
    expect(errors.map(e => e.code)).toEqual([ErrorCode.ParseUndefinedVar]);
    expect(scene.shapes[0].shape.style.fill).toBe('$undefined');
    expect(render('rect $undefined')).toContain('fill="$undefined"');
  });

  it('keeps points collected before an unterminated list', () => {
    const { scene, errors } = evaluate('polygon points [0,0 100,0');
    expect(errors.map(e => e.code)).toEqual([ErrorCode.ParseMissingBracket]);
    expect(scene.shapes[0].shape.props).toEqual({ points: [[0, 0], [100, 0]] });
  });

  it('spaces stacked rects by height plus gap', () => {
    const svg = render('stack gap 10\n  rect size 50x30\n  rect size 50x30\n  rect size 50x30');
    const ys = [...svg.matchAll(/<rect x="0" y="(\d+)"/g)].map(m => Number(m[1]));
    expect(ys).toEqual([0, 40, 80]);
  });
});

describe('parseSource and renderAst', () => {
  it('render a parsed document the same way as the one-shot pipeline', () => {
    const source = 'canvas tiny\nrect $missing';
    const { ast, errors, variables } = parseSource(source);
    expect(variables.size).toBe(0);
    expect(errors.map(e => e.code)).toEqual([ErrorCode.ParseUndefinedVar]);
    expect(renderAst(ast, errors)).toEqual(renderWithErrors(source));
  });

  it('renders an ast without prior errors', () => {
    expect(renderAst(parseSource('circle 3').ast)).toEqual({
      svg: `${head(64)}<circle cx="0" cy="0" r="3"/></svg>`,
      errors: [],
    });
  });
});
