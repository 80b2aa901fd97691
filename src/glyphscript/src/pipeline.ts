import type { SceneAst } from './ast.js';
import { diagnostic, ErrorCode, type Diagnostic } from './errors.js';
import { evaluateAst, type SceneState } from './evaluator.js';
import { tokenize } from './lexer.js';
import { parse, type ParseResult } from './parser.js';
import { errorDocument, renderScene } from './renderer.js';

export * from './ast.js';
export * from './errors.js';
export * from './tokens.js';
export { tokenize } from './lexer.js';
export { parse, Parser, suggestCommand, type ParseResult } from './parser.js';
export { evaluateAst, type SceneItem, type SceneState } from './evaluator.js';
export { edgeAnchors, layoutGraph, measure, stackOffsets, type PlacedNode, type RoutedEdge } from './layout.js';
export {
  errorDocument,
  escapeAttr,
  escapeText,
  renderDefs,
  renderScene,
  transformAttr,
  SVG_NS,
  type RenderResult,
  type ResourceEntry,
} from './renderer.js';

export interface Evaluation {
  scene: SceneState;
  errors: Diagnostic[];
}

export interface RenderOutput {
  svg: string;
  errors: Diagnostic[];
}

export function parseSource(source: string): ParseResult {
  return parse(tokenize(source));
}

/** Lexes, parses and evaluates a document. */
export function evaluate(source: string): Evaluation {
  const { ast, errors } = parseSource(source);
  const scene = evaluateAst(ast, errors);
  return { scene, errors: scene.errors };
}

export function renderAst(ast: SceneAst, errors: readonly Diagnostic[] = []): RenderOutput {
  const { svg, errors: all } = renderScene(evaluateAst(ast, errors));
  return { svg, errors: all };
}

/** Full pipeline. Always returns a document, never throws. */
export function renderWithErrors(source: string): RenderOutput {
  try {
    const { scene } = evaluate(source);
    const { svg, errors } = renderScene(scene);
    return { svg, errors };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      svg: errorDocument(message),
      errors: [diagnostic(ErrorCode.RenderSvgError, `Render failed: ${message}`, undefined, { severity: 'fatal' })],
    };
  }
}

export function render(source: string): string {
  return renderWithErrors(source).svg;
}
