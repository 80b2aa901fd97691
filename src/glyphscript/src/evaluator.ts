import { defaultCanvas, type Canvas, type GraphShape, type SceneAst, type Shape } from './ast.js';
import type { Diagnostic } from './errors.js';
import { layoutGraph, stackOffsets, type PlacedNode, type RoutedEdge } from './layout.js';
import type { Pair } from './tokens.js';

export type SceneItem =
  | { type: 'shape'; shape: Exclude<Shape, GraphShape>; offset: Pair; children: SceneItem[] }
  | { type: 'graph'; shape: GraphShape; offset: Pair; nodes: PlacedNode[]; edges: RoutedEdge[] };

/** Renderer input: one canvas and the placed top-level shapes, in document order. */
export interface SceneState {
  canvas: Canvas;
  shapes: SceneItem[];
  errors: Diagnostic[];
}

const ORIGIN: Pair = [0, 0];

function place(shape: Shape, offset: Pair): SceneItem {
  if (shape.kind === 'graph') {
    return { type: 'graph', shape, offset, ...layoutGraph(shape.props) };
  }
  if (shape.kind === 'layout') {
    const offsets = stackOffsets(shape, offset);
    return {
      type: 'shape',
      shape,
      offset,
      children: shape.children.map((child, i) => place(child, offsets[i])),
    };
  }
  // Groups and primitives pass their own offset down unchanged.
  return { type: 'shape', shape, offset, children: shape.children.map(child => place(child, offset)) };
}

/**
 * Walks the AST into a scene: the last canvas statement wins, shapes are
 * placed, variables were already folded in by the parser. `errors` seeds
 * the scene's error list and is not modified.
 */
export function evaluateAst(ast: SceneAst, errors: readonly Diagnostic[] = []): SceneState {
  const scene: SceneState = { canvas: defaultCanvas(), shapes: [], errors: [...errors] };
  for (const statement of ast.statements) {
    switch (statement.type) {
      case 'canvas':
        scene.canvas = { ...statement.canvas };
        break;
      case 'shape':
        scene.shapes.push(place(statement.shape, ORIGIN));
        break;
      case 'variable':
        break;
    }
  }
  return scene;
}
