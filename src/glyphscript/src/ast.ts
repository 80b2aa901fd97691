import type { Literal, Pair } from './tokens.js';

export const CANVAS_TIERS = {
  nano: 16,
  micro: 24,
  tiny: 32,
  small: 48,
  medium: 64,
  large: 96,
  xlarge: 128,
  huge: 192,
  massive: 256,
  giant: 512,
} as const;

export type SizeTier = keyof typeof CANVAS_TIERS;

export const DEFAULT_TIER: SizeTier = 'medium';
export const DEFAULT_CANVAS_FILL = '#fff';

const TIER_ALIASES: Record<string, SizeTier> = { xl: 'xlarge' };

function isTier(name: string): name is SizeTier {
  return Object.prototype.hasOwnProperty.call(CANVAS_TIERS, name);
}

export function resolveTier(name: string): SizeTier | undefined {
  const key = name.toLowerCase();
  if (isTier(key)) return key;
  return TIER_ALIASES[key];
}

export interface Canvas {
  tier: SizeTier;
  fill: string;
}

export function defaultCanvas(): Canvas {
  return { tier: DEFAULT_TIER, fill: DEFAULT_CANVAS_FILL };
}

export function canvasSize(canvas: Canvas): number {
  return CANVAS_TIERS[canvas.tier];
}

export interface Shadow {
  x: number;
  y: number;
  blur: number;
  color: string;
}

export type GradientType = 'linear' | 'radial';

export interface Gradient {
  type: GradientType;
  from: string;
  to: string;
  angle: number;
}

export type TextAnchor = 'start' | 'middle' | 'end';

export interface Style {
  fill?: string;
  stroke?: string;
  strokeWidth: number;
  opacity: number;
  corner: number;
  font: string;
  fontSize: number;
  fontWeight: string;
  textAnchor: TextAnchor;
  shadow?: Shadow;
  gradient?: Gradient;
}

export function defaultStyle(): Style {
  return {
    strokeWidth: 1,
    opacity: 1,
    corner: 0,
    font: 'system-ui',
    fontSize: 16,
    fontWeight: 'normal',
    textAnchor: 'start',
  };
}

export function defaultShadow(): Shadow {
  return { x: 0, y: 4, blur: 8, color: '#0004' };
}

export function defaultGradient(): Gradient {
  return { type: 'linear', from: '#fff', to: '#000', angle: 90 };
}

export interface Transform {
  translate?: Pair;
  rotate: number;
  scale?: Pair;
  origin?: Pair;
}

export function defaultTransform(): Transform {
  return { rotate: 0 };
}

// Per-kind property variants. Only the keys a kind understands survive construction.
export interface RectProps { at?: Pair; size?: Pair; width?: number }
export interface CircleProps { at?: Pair; radius?: number }
export interface EllipseProps { at?: Pair; size?: Pair; radius?: number }
export interface LineProps { from?: Pair; to?: Pair }
export interface PathProps { d?: string }
export interface PolygonProps { points: Pair[] }
export interface TextProps { at?: Pair; content?: string }
export interface ImageProps { at?: Pair; size?: Pair; width?: number; href?: string }
export interface GroupProps { name?: string }

export type LayoutDirection = 'vertical' | 'horizontal';

export interface LayoutProps {
  direction: LayoutDirection;
  gap: number;
  at?: Pair;
}

export type GraphLayout = 'hierarchical' | 'grid' | 'manual';
export type NodeShape = 'rect' | 'circle' | 'ellipse' | 'diamond';
export type EdgeStyle = 'straight' | 'curved' | 'orthogonal';
export type ArrowDirection = 'none' | 'forward' | 'backward' | 'both';

export interface GraphNode {
  id: string;
  shape: NodeShape;
  at?: Pair;
  size?: Pair;
  label?: string;
  style: Style;
}

export interface GraphEdge {
  from: string;
  to: string;
  style: EdgeStyle;
  arrow: ArrowDirection;
  label?: string;
  stroke: string;
  strokeWidth: number;
}

export interface GraphProps {
  layout: GraphLayout;
  direction: LayoutDirection;
  spacing: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export const DEFAULT_NODE_SIZE: Pair = [80, 40];

interface ShapeBase {
  style: Style;
  transform: Transform;
  children: Shape[];
  line: number;
  column: number;
}

export type RectShape = ShapeBase & { kind: 'rect'; props: RectProps };
export type CircleShape = ShapeBase & { kind: 'circle'; props: CircleProps };
export type EllipseShape = ShapeBase & { kind: 'ellipse'; props: EllipseProps };
export type LineShape = ShapeBase & { kind: 'line'; props: LineProps };
export type PathShape = ShapeBase & { kind: 'path'; props: PathProps };
export type PolygonShape = ShapeBase & { kind: 'polygon'; props: PolygonProps };
export type TextShape = ShapeBase & { kind: 'text'; props: TextProps };
export type ImageShape = ShapeBase & { kind: 'image'; props: ImageProps };
export type GroupShape = ShapeBase & { kind: 'group'; props: GroupProps };
export type LayoutShape = ShapeBase & { kind: 'layout'; props: LayoutProps };
export type GraphShape = ShapeBase & { kind: 'graph'; props: GraphProps };

export type Shape =
  | RectShape
  | CircleShape
  | EllipseShape
  | LineShape
  | PathShape
  | PolygonShape
  | TextShape
  | ImageShape
  | GroupShape
  | LayoutShape
  | GraphShape;

export type ShapeKind = Shape['kind'];

export type PrimitiveKind = 'rect' | 'circle' | 'ellipse' | 'line' | 'path' | 'polygon' | 'text' | 'image';

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  'rect',
  'circle',
  'ellipse',
  'line',
  'path',
  'polygon',
  'text',
  'image',
];

export function isPrimitiveKind(word: string): word is PrimitiveKind {
  return PRIMITIVE_KINDS.some(kind => kind === word);
}

/**
 * Untyped bag filled while reading a shape's properties, before the closed
 * variant for its kind is built.
 */
export interface RawProps {
  at?: Pair;
  size?: Pair;
  radius?: number;
  width?: number;
  from?: Pair;
  to?: Pair;
  content?: string;
  d?: string;
  points?: Pair[];
  href?: string;
  fill?: string;
}

type PrimitiveShape = Extract<Shape, { kind: PrimitiveKind }>;

export function buildPrimitive(kind: PrimitiveKind, raw: RawProps, base: ShapeBase): PrimitiveShape {
  switch (kind) {
    case 'rect':
      return { ...base, kind, props: { at: raw.at, size: raw.size, width: raw.width } };
    case 'circle':
      return { ...base, kind, props: { at: raw.at, radius: raw.radius } };
    case 'ellipse':
      return { ...base, kind, props: { at: raw.at, size: raw.size, radius: raw.radius } };
    case 'line':
      return { ...base, kind, props: { from: raw.from, to: raw.to } };
    case 'path':
      return { ...base, kind, props: { d: raw.d ?? raw.content } };
    case 'polygon':
      return { ...base, kind, props: { points: raw.points ?? [] } };
    case 'text':
      return { ...base, kind, props: { at: raw.at, content: raw.content } };
    case 'image':
      return { ...base, kind, props: { at: raw.at, size: raw.size, width: raw.width, href: raw.href } };
  }
}

export type Statement =
  | { type: 'canvas'; canvas: Canvas; line: number }
  | { type: 'variable'; name: string; value?: Literal; line: number }
  | { type: 'shape'; shape: Shape };

export interface SceneAst {
  statements: Statement[];
}

/** Collects the top-level shapes of a parsed document in order. */
export function topLevelShapes(ast: SceneAst): Shape[] {
  const shapes: Shape[] = [];
  for (const statement of ast.statements) {
    if (statement.type === 'shape') shapes.push(statement.shape);
  }
  return shapes;
}
