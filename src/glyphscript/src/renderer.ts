import {
  CANVAS_TIERS,
  DEFAULT_TIER,
  canvasSize,
  type Gradient,
  type Shadow,
  type Shape,
  type Style,
  type Transform,
} from './ast.js';
import { diagnostic, ErrorCode, type Diagnostic } from './errors.js';
import type { SceneItem, SceneState } from './evaluator.js';
import { DEFAULT_CIRCLE_RADIUS, type PlacedNode, type RoutedEdge } from './layout.js';
import type { Pair } from './tokens.js';

export const SVG_NS = 'http://www.w3.org/2000/svg';

const ARROW_SIZE = 10;

export type ResourceEntry =
  | { id: string; kind: 'gradient'; def: Gradient }
  | { id: string; kind: 'shadow'; def: Shadow };

export interface RenderResult {
  svg: string;
  /** Definitions allocated while writing shapes, in registration order. */
  resources: ResourceEntry[];
  errors: Diagnostic[];
}

export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttr(text: string): string {
  return escapeText(text).replace(/"/g, '&quot;');
}

function attr(name: string, value: string | number): string {
  return ` ${name}="${escapeAttr(String(value))}"`;
}

/** Rounds derived geometry so trigonometry doesn't leak long fractions. */
function round(n: number): number {
  return Math.round(n * 100) / 100;
}

function point([x, y]: Pair): string {
  return `${x},${y}`;
}

/** Hands out `d1, d2, …` for gradients and shadows from one counter. */
class ResourceRegistry {
  private nextId = 1;
  readonly entries: ResourceEntry[] = [];

  gradient(def: Gradient): string {
    const id = `d${this.nextId++}`;
    this.entries.push({ id, kind: 'gradient', def });
    return id;
  }

  shadow(def: Shadow): string {
    const id = `d${this.nextId++}`;
    this.entries.push({ id, kind: 'shadow', def });
    return id;
  }
}

class ShapeWriter {
  constructor(private readonly registry: ResourceRegistry) {}

  items(items: readonly SceneItem[]): string {
    return items.map(item => this.item(item)).join('');
  }

  private item(item: SceneItem): string {
    if (item.type === 'graph') {
      const { shape, offset } = item;
      const edges = item.edges.map(edge => this.edge(edge)).join('');
      const nodes = item.nodes.map(node => this.node(node)).join('');
      return `<g${this.style(shape.style)}${transformAttr(shape.transform, offset)}>${edges}${nodes}</g>`;
    }

    const children = this.items(item.children);
    const { shape, offset } = item;
    if (shape.kind === 'group' || shape.kind === 'layout') {
      return `<g${this.style(shape.style)}${transformAttr(shape.transform)}>${children}</g>`;
    }
    return this.primitive(shape, offset) + children;
  }

  private style(style: Style, fallbackFill?: string): string {
    let out = '';
    if (style.gradient) {
      out += attr('fill', `url(#${this.registry.gradient(style.gradient)})`);
    } else if (style.fill !== undefined || fallbackFill !== undefined) {
      out += attr('fill', style.fill ?? fallbackFill ?? '');
    }
    if (style.stroke !== undefined) out += attr('stroke', style.stroke);
    if (style.strokeWidth !== 1) out += attr('stroke-width', style.strokeWidth);
    if (style.opacity < 1) out += attr('opacity', style.opacity);
    if (style.shadow) out += attr('filter', `url(#${this.registry.shadow(style.shadow)})`);
    return out;
  }

  private primitive(shape: Exclude<Shape, { kind: 'group' | 'layout' | 'graph' }>, [ox, oy]: Pair): string {
    const transform = transformAttr(shape.transform);
    switch (shape.kind) {
      case 'rect': {
        const [x, y] = shape.props.at ?? [0, 0];
        const side = shape.props.width ?? 100;
        const [w, h] = shape.props.size ?? [side, side];
        const rx = shape.style.corner !== 0 ? attr('rx', shape.style.corner) : '';
        return `<rect${attr('x', x + ox)}${attr('y', y + oy)}${attr('width', w)}${attr('height', h)}${rx}${this.style(shape.style)}${transform}/>`;
      }
      case 'circle': {
        const [cx, cy] = shape.props.at ?? [0, 0];
        const r = shape.props.radius ?? DEFAULT_CIRCLE_RADIUS;
        return `<circle${attr('cx', cx + ox)}${attr('cy', cy + oy)}${attr('r', r)}${this.style(shape.style)}${transform}/>`;
      }
      case 'ellipse': {
        const [cx, cy] = shape.props.at ?? [0, 0];
        const radius = shape.props.radius;
        const [rx, ry] = shape.props.size ?? (radius !== undefined ? [radius, radius] : [50, 30]);
        return `<ellipse${attr('cx', cx + ox)}${attr('cy', cy + oy)}${attr('rx', rx)}${attr('ry', ry)}${this.style(shape.style)}${transform}/>`;
      }
      case 'line': {
        const [x1, y1] = shape.props.from ?? [0, 0];
        const [x2, y2] = shape.props.to ?? [100, 100];
        const style = { ...shape.style, stroke: shape.style.stroke ?? '#000' };
        return `<line${attr('x1', x1 + ox)}${attr('y1', y1 + oy)}${attr('x2', x2 + ox)}${attr('y2', y2 + oy)}${this.style(style)}${transform}/>`;
      }
      case 'path': {
        const shifted = ox !== 0 || oy !== 0 ? transformAttr(shape.transform, [ox, oy]) : transform;
        return `<path${attr('d', shape.props.d ?? '')}${this.style(shape.style)}${shifted}/>`;
      }
      case 'polygon': {
        const points = shape.props.points.map(([x, y]) => point([x + ox, y + oy])).join(' ');
        return `<polygon${attr('points', points)}${this.style(shape.style)}${transform}/>`;
      }
      case 'text': {
        const [x, y] = shape.props.at ?? [0, 0];
        const { style } = shape;
        const weight = style.fontWeight === 'italic' ? attr('font-style', 'italic') : attr('font-weight', style.fontWeight);
        return (
          `<text${attr('x', x + ox)}${attr('y', y + oy)}${attr('font-family', style.font)}${attr('font-size', style.fontSize)}` +
          `${weight}${attr('text-anchor', style.textAnchor)}${this.style(style, '#000')}${transform}>` +
          `${escapeText(shape.props.content ?? '')}</text>`
        );
      }
      case 'image': {
        const [x, y] = shape.props.at ?? [0, 0];
        const side = shape.props.width ?? 100;
        const [w, h] = shape.props.size ?? [side, side];
        return `<image${attr('x', x + ox)}${attr('y', y + oy)}${attr('width', w)}${attr('height', h)}${attr('href', shape.props.href ?? '')}${this.style(shape.style)}${transform}/>`;
      }
    }
  }

  private edge(edge: RoutedEdge): string {
    const [sx, sy] = edge.start;
    const [ex, ey] = edge.end;
    let d: string;
    // Points the path arrives at the end from / leaves the start towards.
    let beforeEnd: Pair;
    let afterStart: Pair;

    switch (edge.style) {
      case 'curved': {
        const control: Pair = edge.vertical ? [sx, (sy + ey) / 2] : [(sx + ex) / 2, sy];
        d = `M ${sx} ${sy} Q ${control[0]} ${control[1]} ${ex} ${ey}`;
        beforeEnd = control;
        afterStart = control;
        break;
      }
      case 'orthogonal': {
        const mx = (sx + ex) / 2;
        d = `M ${sx} ${sy} L ${mx} ${sy} L ${mx} ${ey} L ${ex} ${ey}`;
        beforeEnd = mx === ex ? [mx, sy] : [mx, ey];
        afterStart = mx === sx ? [mx, ey] : [mx, sy];
        break;
      }
      default:
        d = `M ${sx} ${sy} L ${ex} ${ey}`;
        beforeEnd = edge.start;
        afterStart = edge.end;
    }

    let out = `<path${attr('d', d)} fill="none"${attr('stroke', edge.stroke)}${attr('stroke-width', edge.strokeWidth)}/>`;
    if (edge.arrow === 'forward' || edge.arrow === 'both') out += arrowHead(edge.end, beforeEnd, edge.stroke);
    if (edge.arrow === 'backward' || edge.arrow === 'both') out += arrowHead(edge.start, afterStart, edge.stroke);
    if (edge.label !== undefined) {
      out +=
        `<text${attr('x', (sx + ex) / 2)}${attr('y', (sy + ey) / 2)} text-anchor="middle" font-family="system-ui" font-size="12"` +
        `${attr('fill', edge.stroke)}>${escapeText(edge.label)}</text>`;
    }
    return out;
  }

  private node(node: PlacedNode): string {
    const { cx, cy, width: w, height: h } = node;
    const style = this.style({ ...node.style, fill: node.style.fill ?? '#fff', stroke: node.style.stroke ?? '#333' });
    let out: string;
    switch (node.shape) {
      case 'circle':
        out = `<circle${attr('cx', cx)}${attr('cy', cy)}${attr('r', Math.min(w, h) / 2)}${style}/>`;
        break;
      case 'ellipse':
        out = `<ellipse${attr('cx', cx)}${attr('cy', cy)}${attr('rx', w / 2)}${attr('ry', h / 2)}${style}/>`;
        break;
      case 'diamond': {
        const points = [point([cx, cy - h / 2]), point([cx + w / 2, cy]), point([cx, cy + h / 2]), point([cx - w / 2, cy])];
        out = `<polygon${attr('points', points.join(' '))}${style}/>`;
        break;
      }
      default:
        out = `<rect${attr('x', cx - w / 2)}${attr('y', cy - h / 2)}${attr('width', w)}${attr('height', h)}${style}/>`;
    }
    if (node.label !== undefined) {
      out +=
        `<text${attr('x', cx)}${attr('y', cy)} text-anchor="middle" dominant-baseline="middle"` +
        `${attr('font-family', node.style.font)}${attr('font-size', node.style.fontSize)} fill="#000">${escapeText(node.label)}</text>`;
    }
    return out;
  }
}

function arrowHead(tip: Pair, from: Pair, color: string): string {
  const angle = Math.atan2(tip[1] - from[1], tip[0] - from[0]);
  const wing = (delta: number): Pair => [
    round(tip[0] - ARROW_SIZE * Math.cos(angle + delta)),
    round(tip[1] - ARROW_SIZE * Math.sin(angle + delta)),
  ];
  const points = [point(tip), point(wing(-Math.PI / 6)), point(wing(Math.PI / 6))].join(' ');
  return `<polygon${attr('points', points)}${attr('fill', color)}/>`;
}

export function transformAttr(transform: Transform, offset?: Pair): string {
  const parts: string[] = [];
  if (offset && (offset[0] !== 0 || offset[1] !== 0)) parts.push(`translate(${offset[0]},${offset[1]})`);
  if (transform.translate) parts.push(`translate(${transform.translate[0]},${transform.translate[1]})`);
  if (transform.rotate !== 0) {
    parts.push(
      transform.origin
        ? `rotate(${transform.rotate},${transform.origin[0]},${transform.origin[1]})`
        : `rotate(${transform.rotate})`,
    );
  }
  if (transform.scale) parts.push(`scale(${transform.scale[0]},${transform.scale[1]})`);
  return parts.length > 0 ? attr('transform', parts.join(' ')) : '';
}

function stops(def: Gradient): string {
  return `<stop offset="0%"${attr('stop-color', def.from)}/><stop offset="100%"${attr('stop-color', def.to)}/>`;
}

function gradientMarkup(id: string, def: Gradient): string {
  if (def.type === 'radial') {
    return `<radialGradient${attr('id', id)}>${stops(def)}</radialGradient>`;
  }
  const rad = ((def.angle - 90) * Math.PI) / 180;
  const dx = 50 * Math.cos(rad);
  const dy = 50 * Math.sin(rad);
  const pct = (n: number) => `${n.toFixed(1)}%`;
  return (
    `<linearGradient${attr('id', id)}${attr('x1', pct(50 - dx))}${attr('y1', pct(50 - dy))}` +
    `${attr('x2', pct(50 + dx))}${attr('y2', pct(50 + dy))}>${stops(def)}</linearGradient>`
  );
}

function shadowMarkup(id: string, def: Shadow): string {
  return (
    `<filter${attr('id', id)} x="-50%" y="-50%" width="200%" height="200%">` +
    `<feDropShadow${attr('dx', def.x)}${attr('dy', def.y)}${attr('stdDeviation', def.blur)}${attr('flood-color', def.color)}/>` +
    `</filter>`
  );
}

/** Second pass: the shared definitions block, gradients before filters. */
export function renderDefs(resources: readonly ResourceEntry[]): string {
  if (resources.length === 0) return '';
  let gradients = '';
  let filters = '';
  for (const entry of resources) {
    if (entry.kind === 'gradient') gradients += gradientMarkup(entry.id, entry.def);
    else filters += shadowMarkup(entry.id, entry.def);
  }
  return `<defs>${gradients}${filters}</defs>`;
}

export function errorDocument(message: string, size: number = CANVAS_TIERS[DEFAULT_TIER]): string {
  return (
    `<svg xmlns="${SVG_NS}" width="${size}" height="${size}">` +
    `<rect width="100%" height="100%" fill="#1a1a2e"/>` +
    `<text x="20" y="30" fill="#f85149" font-family="monospace" font-size="12">Render Error: ${escapeText(message)}</text>` +
    `</svg>`
  );
}

/**
 * Serializes a scene. Shapes are written first so that every gradient and
 * shadow they use is registered; the definitions block is then built from
 * exactly those registrations. Any failure yields the error document and a
 * render diagnostic instead of an exception.
 */
export function renderScene(scene: SceneState): RenderResult {
  const size = canvasSize(scene.canvas);
  try {
    const registry = new ResourceRegistry();
    const markup = new ShapeWriter(registry).items(scene.shapes);
    const svg =
      `<svg xmlns="${SVG_NS}" width="${size}" height="${size}">` +
      `<rect width="100%" height="100%"${attr('fill', scene.canvas.fill)}/>` +
      `${renderDefs(registry.entries)}${markup}</svg>`;
    return { svg, resources: registry.entries, errors: [...scene.errors] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      svg: errorDocument(message, size),
      resources: [],
      errors: [...scene.errors, diagnostic(ErrorCode.RenderSvgError, `Render failed: ${message}`)],
    };
  }
}
