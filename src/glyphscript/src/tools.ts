import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { DEFAULT_MAX_SOURCE_LENGTH } from './config.js';
import { errorsToResponse, summarizeErrors } from './errors.js';
import { evaluate, renderWithErrors } from './pipeline.js';

type ToolInput = Tool['inputSchema'];

export const RenderArgsSchema = z.object({
  code: z.string().describe('glyphscript source to render'),
});

export const CheckArgsSchema = z.object({
  code: z.string().describe('glyphscript source to check'),
});

export const DSL_REFERENCE = [
  'glyphscript is an indentation-based drawing language. One statement per line;',
  'indented lines configure or nest under the line above.',
  '',
  'canvas <tier> [fill #hex]   tiers: nano 16, micro 24, tiny 32, small 48, medium 64 (default),',
  '                            large 96, xlarge 128, huge 192, massive 256, giant 512',
  '$name = <value>             variables: numbers, "strings", #colors, 10,20 pairs',
  'rect [at X,Y] [size WxH] [#fill]',
  'circle [at X,Y] [radius R]   ellipse [at X,Y] [size RXxRY]',
  'line from X,Y to X,Y         path "M0 0 L10 10"         polygon [0,0 10,0 5,10]',
  'text "content" [at X,Y]      image [at X,Y] [size WxH] href "url"',
  'group ["name"]               stack|row [gap N] [at X,Y]  (children indented below)',
  'graph [hierarchical|grid|manual] [vertical|horizontal] [spacing N]',
  '  node "id" [at X,Y] [size WxH] [shape rect|circle|ellipse|diamond] [label "text"]',
  '  edge "a" -> "b" [straight|curved|orthogonal] [arrow none|forward|backward|both] [label "text"]',
  '',
  'Block properties: fill C, stroke C [W], opacity N, corner N, shadow [X,Y] [BLUR] [C],',
  'gradient [linear|radial] C1 [C2] [ANGLE], font "family" [SIZE], bold, italic,',
  'center, end, translate X,Y, rotate DEG, scale X,Y, origin X,Y.',
  'Comments start with //.',
].join('\n');

export const TOOLS: Tool[] = [
  {
    name: 'render_glyphscript',
    description:
      'Render a glyphscript document to SVG markup. Always returns a document; ' +
      'problems in the source are listed after it.\n\n' +
      DSL_REFERENCE,
    inputSchema: zodToJsonSchema(RenderArgsSchema) as ToolInput,
  },
  {
    name: 'check_glyphscript',
    description:
      'Check a glyphscript document without rendering it. Returns the diagnostics ' +
      'as a JSON array of {code, category, message, line, column, severity}, or "No errors".',
    inputSchema: zodToJsonSchema(CheckArgsSchema) as ToolInput,
  },
];

function checkLength(code: string, maxSourceLength: number): void {
  if (code.length > maxSourceLength) {
    throw new Error(`Source is ${code.length} characters, over the limit of ${maxSourceLength}`);
  }
}

export function handleToolCall(
  name: string,
  args: unknown,
  maxSourceLength: number = DEFAULT_MAX_SOURCE_LENGTH,
): CallToolResult {
  try {
    switch (name) {
      case 'render_glyphscript': {
        const parsed = RenderArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new Error(`Invalid arguments for render_glyphscript: ${parsed.error}`);
        }
        checkLength(parsed.data.code, maxSourceLength);
        const { svg, errors } = renderWithErrors(parsed.data.code);
        const content: CallToolResult['content'] = [{ type: 'text', text: svg }];
        if (errors.length > 0) {
          content.push({ type: 'text', text: `Diagnostics: ${summarizeErrors(errors)}` });
        }
        return { content };
      }

      case 'check_glyphscript': {
        const parsed = CheckArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new Error(`Invalid arguments for check_glyphscript: ${parsed.error}`);
        }
        checkLength(parsed.data.code, maxSourceLength);
        const { errors } = evaluate(parsed.data.code);
        const text = errors.length === 0 ? 'No errors' : JSON.stringify(errorsToResponse(errors), null, 2);
        return { content: [{ type: 'text', text }] };
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
}
