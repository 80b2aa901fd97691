import {
  DEFAULT_NODE_SIZE,
  type ArrowDirection,
  type EdgeStyle,
  type GraphProps,
  type LayoutShape,
  type NodeShape,
  type Shape,
  type Style,
} from './ast.js';
import type { Pair } from './tokens.js';

export const DEFAULT_CIRCLE_RADIUS = 50;
export const PLACEHOLDER_SIZE: Pair = [40, 40];

const CHAR_WIDTH_FACTOR = 0.6;
const LINE_HEIGHT_FACTOR = 1.2;

/**
 * Structural bounding size used for stack/row placement. No font metrics:
 * text width is a character-count estimate.
 */
export function measure(shape: Shape): Pair {
  switch (shape.kind) {
    case 'rect':
    case 'image':
      return shape.props.size ?? PLACEHOLDER_SIZE;
    case 'ellipse':
      if (shape.props.size) return shape.props.size;
      if (shape.props.radius !== undefined) return [shape.props.radius * 2, shape.props.radius * 2];
      return PLACEHOLDER_SIZE;
    case 'circle': {
      const r = shape.props.radius ?? DEFAULT_CIRCLE_RADIUS;
      return [r * 2, r * 2];
    }
    case 'text': {
      const chars = [...(shape.props.content ?? '')].length;
      return [chars * shape.style.fontSize * CHAR_WIDTH_FACTOR, shape.style.fontSize * LINE_HEIGHT_FACTOR];
    }
    case 'layout':
      return measureLayout(shape);
    default:
      return PLACEHOLDER_SIZE;
  }
}

function measureLayout(layout: LayoutShape): Pair {
  const { direction, gap } = layout.props;
  let along = 0;
  let across = 0;
  layout.children.forEach((child, i) => {
    const [w, h] = measure(child);
    along += (direction === 'vertical' ? h : w) + (i > 0 ? gap : 0);
    across = Math.max(across, direction === 'vertical' ? w : h);
  });
  return direction === 'vertical' ? [across, along] : [along, across];
}

/**
 * Offsets for each child of a stack/row: sequential along the primary axis
 * from `base + at`, advancing by the measured extent plus the gap.
 */
export function stackOffsets(layout: LayoutShape, base: Pair): Pair[] {
  const { direction, gap } = layout.props;
  const [ox, oy] = layout.props.at ?? [0, 0];
  let cursor = 0;
  return layout.children.map(child => {
    const [w, h] = measure(child);
    const offset: Pair =
      direction === 'vertical' ? [base[0] + ox, base[1] + oy + cursor] : [base[0] + ox + cursor, base[1] + oy];
    cursor += (direction === 'vertical' ? h : w) + gap;
    return offset;
  });
}

export interface PlacedNode {
  id: string;
  shape: NodeShape;
  cx: number;
  cy: number;
  width: number;
  height: number;
  label?: string;
  style: Style;
}

export interface RoutedEdge {
  from: PlacedNode;
  to: PlacedNode;
  start: Pair;
  end: Pair;
  /** True when the vertical displacement dominated anchor selection. */
  vertical: boolean;
  style: EdgeStyle;
  arrow: ArrowDirection;
  label?: string;
  stroke: string;
  strokeWidth: number;
}

export interface GraphPlacement {
  nodes: PlacedNode[];
  edges: RoutedEdge[];
}

function placeNodes(props: GraphProps): PlacedNode[] {
  const { spacing, direction } = props;
  const sized = props.nodes.map(node => ({ node, size: node.size ?? DEFAULT_NODE_SIZE }));
  const maxW = Math.max(0, ...sized.map(s => s.size[0]));
  const maxH = Math.max(0, ...sized.map(s => s.size[1]));
  const cols = Math.ceil(Math.sqrt(sized.length));
  let cursor = spacing;

  return sized.map(({ node, size: [width, height] }, i) => {
    let center: Pair = node.at ?? [0, 0];
    switch (props.layout) {
      case 'hierarchical':
        if (direction === 'vertical') {
          center = [spacing + maxW / 2, cursor + height / 2];
          cursor += height + spacing;
        } else {
          center = [cursor + width / 2, spacing + maxH / 2];
          cursor += width + spacing;
        }
        break;
      case 'grid': {
        const col = i % cols;
        const row = Math.floor(i / cols);
        center = [spacing + col * (maxW + spacing) + maxW / 2, spacing + row * (maxH + spacing) + maxH / 2];
        break;
      }
      // manual keeps the authored center
    }
    return {
      id: node.id,
      shape: node.shape,
      cx: center[0],
      cy: center[1],
      width,
      height,
      label: node.label,
      style: node.style,
    };
  });
}

/**
 * Picks the boundary points an edge leaves and enters by: top/bottom when
 * the vertical delta between centers dominates, left/right otherwise.
 */
export function edgeAnchors(from: PlacedNode, to: PlacedNode): { start: Pair; end: Pair; vertical: boolean } {
  const dx = to.cx - from.cx;
  const dy = to.cy - from.cy;
  if (Math.abs(dy) > Math.abs(dx)) {
    const sign = dy > 0 ? 1 : -1;
    return {
      start: [from.cx, from.cy + (sign * from.height) / 2],
      end: [to.cx, to.cy - (sign * to.height) / 2],
      vertical: true,
    };
  }
  const sign = dx >= 0 ? 1 : -1;
  return {
    start: [from.cx + (sign * from.width) / 2, from.cy],
    end: [to.cx - (sign * to.width) / 2, to.cy],
    vertical: false,
  };
}

export function layoutGraph(props: GraphProps): GraphPlacement {
  const nodes = placeNodes(props);
  const byId = new Map<string, PlacedNode>();
  for (const node of nodes) {
    if (!byId.has(node.id)) byId.set(node.id, node);
  }

  const edges: RoutedEdge[] = [];
  for (const edge of props.edges) {
    const from = byId.get(edge.from);
    const to = byId.get(edge.to);
    if (!from || !to) continue;
    edges.push({
      from,
      to,
      ...edgeAnchors(from, to),
      style: edge.style,
      arrow: edge.arrow,
      label: edge.label,
      stroke: edge.stroke,
      strokeWidth: edge.strokeWidth,
    });
  }
  return { nodes, edges };
}
