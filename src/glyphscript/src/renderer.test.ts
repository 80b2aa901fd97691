import { describe, expect, it } from 'vitest';
import { defaultStyle, defaultTransform, type Shape } from './ast.js';
import { ErrorCode } from './errors.js';
import { evaluateAst, type SceneState } from './evaluator.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import { errorDocument, escapeAttr, escapeText, renderScene, transformAttr } from './renderer.js';
import type { Pair } from './tokens.js';

const HEAD = '<svg xmlns="http://www.w3.org/2000/svg" width="64" height="64"><rect width="100%" height="100%" fill="#fff"/>';

const sceneOf = (source: string) => evaluateAst(parse(tokenize(source)).ast);
const body = (source: string) => {
  const { svg } = renderScene(sceneOf(source));
  expect(svg.startsWith(HEAD)).toBe(true);
  return svg.slice(HEAD.length, -'</svg>'.length);
};

describe('renderScene', () => {
  it('writes a rect with its position, size and fill', () => {
    expect(renderScene(sceneOf('rect at 10,10 size 100x50\n  fill #f00')).svg).toBe(
      `${HEAD}<rect x="10" y="10" width="100" height="50" fill="#f00"/></svg>`,
    );
  });

  it('keeps negative and fractional geometry verbatim', () => {
    expect(body('rect at -5,2.5 size 0.5x300')).toBe('<rect x="-5" y="2.5" width="0.5" height="300"/>');
  });

  it('emits only style attributes that differ from the defaults', () => {
    expect(body('rect\n  stroke #000 2\n  opacity 0.5\n  corner 4')).toBe(
      '<rect x="0" y="0" width="100" height="100" rx="4" stroke="#000" stroke-width="2" opacity="0.5"/>',
    );
    expect(body('rect\n  opacity 1')).toBe('<rect x="0" y="0" width="100" height="100"/>');
  });

  it('writes each primitive with its defaults', () => {
    expect(body('circle')).toBe('<circle cx="0" cy="0" r="50"/>');
    expect(body('ellipse')).toBe('<ellipse cx="0" cy="0" rx="50" ry="30"/>');
    expect(body('line from 0,0 to 10,20')).toBe('<line x1="0" y1="0" x2="10" y2="20" stroke="#000"/>');
    expect(body('polygon [0,0 10,0 5,10]\n  fill #abc')).toBe('<polygon points="0,0 10,0 5,10" fill="#abc"/>');
    expect(body('image at 1,2 size 30x40 href "a.png"')).toBe('<image x="1" y="2" width="30" height="40" href="a.png"/>');
    expect(body('path "M0 0 L5 5"\n  stroke #123')).toBe('<path d="M0 0 L5 5" stroke="#123"/>');
  });

  it('escapes text content', () => {
    expect(body('text "a<b & c>d" at 5,6')).toBe(
      '<text x="5" y="6" font-family="system-ui" font-size="16" font-weight="normal" text-anchor="start" fill="#000">a&lt;b &amp; c&gt;d</text>',
    );
  });

  it('writes italic as a font style', () => {
    expect(body('text "x"\n  italic')).toBe(
      '<text x="0" y="0" font-family="system-ui" font-size="16" font-style="italic" text-anchor="start" fill="#000">x</text>',
    );
  });

  it('wraps groups and layouts in g elements', () => {
    expect(body('group\n  rect size 1x1\n  opacity 0.5')).toBe('<g opacity="0.5"><rect x="0" y="0" width="1" height="1"/></g>');
    expect(body('stack gap 10\n  rect size 50x30\n  rect size 50x30')).toBe(
      '<g><rect x="0" y="0" width="50" height="30"/><rect x="0" y="40" width="50" height="30"/></g>',
    );
  });

  it('shifts paths inside a layout with a translate', () => {
    expect(body('row\n  rect size 10x10\n  path "M0 0"')).toBe(
      '<g><rect x="0" y="0" width="10" height="10"/><path d="M0 0" transform="translate(10,0)"/></g>',
    );
  });

  it('registers gradients and shadows and references them by id', () => {
    expect(body('rect size 10x10\n  gradient #f00 #00f\n  shadow')).toBe(
      '<defs>' +
        '<linearGradient id="d1" x1="0.0%" y1="50.0%" x2="100.0%" y2="50.0%">' +
        '<stop offset="0%" stop-color="#f00"/><stop offset="100%" stop-color="#00f"/></linearGradient>' +
        '<filter id="d2" x="-50%" y="-50%" width="200%" height="200%">' +
        '<feDropShadow dx="0" dy="4" stdDeviation="8" flood-color="#0004"/></filter>' +
        '</defs>' +
        '<rect x="0" y="0" width="10" height="10" fill="url(#d1)" filter="url(#d2)"/>',
    );
  });

  it('allocates ids in registration order and restarts them per render', () => {
    const scene = sceneOf('rect\n  gradient #f00\ncircle\n  shadow\n  gradient radial #0f0');
    const first = renderScene(scene);
    expect(first.resources.map(r => [r.id, r.kind])).toEqual([
      ['d1', 'gradient'],
      ['d2', 'gradient'],
      ['d3', 'shadow'],
    ]);
    expect(first.svg).toContain('<radialGradient id="d2"><stop offset="0%" stop-color="#0f0"/>');
    expect(first.svg).toContain('<circle cx="0" cy="0" r="50" fill="url(#d2)" filter="url(#d3)"/>');
    expect(renderScene(scene)).toEqual(first);
  });

  it('expands graphs with edges behind nodes', () => {
    const source = [
      'graph manual',
      '  node "a" at 50,50 label "A"',
      '  node "b" at 200,50 shape circle',
      '  edge "a" -> "b" label "x<y"',
    ].join('\n');
    expect(body(source)).toBe(
      '<g>' +
        '<path d="M 90 50 L 160 50" fill="none" stroke="#333" stroke-width="2"/>' +
        '<polygon points="160,50 151.34,55 151.34,45" fill="#333"/>' +
        '<text x="125" y="50" text-anchor="middle" font-family="system-ui" font-size="12" fill="#333">x&lt;y</text>' +
        '<rect x="10" y="30" width="80" height="40" fill="#fff" stroke="#333"/>' +
        '<text x="50" y="50" text-anchor="middle" dominant-baseline="middle" font-family="system-ui" font-size="16" fill="#000">A</text>' +
        '<circle cx="200" cy="50" r="20" fill="#fff" stroke="#333"/>' +
        '</g>',
    );
  });

  it('shapes curved and orthogonal connectors by their dominant axis', () => {
    const curved = body('graph\n  node "a" at 0,0\n  node "b" at 0,100\n  edge "a" -> "b" curved arrow none');
    expect(curved).toContain('<path d="M 0 20 Q 0 50 0 80" fill="none"');
    expect(curved).not.toContain('<polygon');

    const sideways = body('graph\n  node "a" at 0,0\n  node "b" at 200,30\n  edge "a" -> "b" curved arrow none');
    expect(sideways).toContain('<path d="M 40 0 Q 100 0 160 30" fill="none"');

    const orthogonal = body('graph\n  node "a" at 0,0\n  node "b" at 200,60\n  edge "a" -> "b" orthogonal none');
    expect(orthogonal).toContain('<path d="M 40 0 L 100 0 L 100 60 L 160 60" fill="none"');
  });

  it('draws diamond nodes as polygons', () => {
    expect(body('graph\n  node "d" at 50,50 shape diamond')).toBe(
      '<g><polygon points="50,30 90,50 50,70 10,50" fill="#fff" stroke="#333"/></g>',
    );
  });

  it('falls back to an error document when writing fails', () => {
    const props = {
      get at(): Pair {
        throw new Error('boom <bad>');
      },
    };
    const shape: Shape = { kind: 'rect', props, style: defaultStyle(), transform: defaultTransform(), children: [], line: 1, column: 1 };
    const scene: SceneState = {
      canvas: { tier: 'small', fill: '#fff' },
      shapes: [{ type: 'shape', shape, offset: [0, 0], children: [] }],
      errors: [],
    };

    const result = renderScene(scene);
    expect(result.svg).toBe(errorDocument('boom <bad>', 48));
    expect(result.svg).toContain('Render Error: boom &lt;bad&gt;</text>');
    expect(result.resources).toEqual([]);
    expect(result.errors).toEqual([
      expect.objectContaining({ code: ErrorCode.RenderSvgError, message: 'Render failed: boom <bad>', severity: 'error' }),
    ]);
  });
});

describe('transformAttr', () => {
  it('composes translate, rotate and scale in that order', () => {
    expect(transformAttr({ translate: [5, 5], rotate: 30, scale: [2, 2], origin: [10, 10] })).toBe(
      ' transform="translate(5,5) rotate(30,10,10) scale(2,2)"',
    );
  });

  it('rotates about the origin without a pivot', () => {
    expect(transformAttr({ rotate: 45 })).toBe(' transform="rotate(45)"');
  });

  it('omits the attribute for an identity transform', () => {
    expect(transformAttr(defaultTransform())).toBe('');
    expect(transformAttr(defaultTransform(), [3, 4])).toBe(' transform="translate(3,4)"');
  });
});

describe('escaping', () => {
  it('escapes markup characters in text and quotes in attributes', () => {
    expect(escapeText('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
    expect(escapeAttr('say "hi" & go')).toBe('say &quot;hi&quot; &amp; go');
  });
});
