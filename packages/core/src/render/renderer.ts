import { getByPath, isContext, type VariableContext } from '../flux/context.js';
import type { DiagnosticSink } from '../types.js';
import type { Operand, ParsedTemplate, Pipeline, TemplateNode } from './ast.js';
import { executeTemplate, type PartialProvider } from './exec.js';
import { parseTemplate } from './parser.js';
import { preprocessShorthand } from './shorthand.js';

export interface RenderOptions {
  partials?: PartialProvider; // enables {{partial "name"}}
  diagnostics?: DiagnosticSink; // receives unresolved-variable warnings
  file?: string; // used in diagnostics and error messages
}

// ============================================================================
// Root reference collection
// ============================================================================

interface Reference {
  path: string;
  printed: boolean; // the whole action is this reference, so its value is output
}

interface Collection {
  template: ParsedTemplate;
  refs: Reference[];
  including: Set<string>; // defines being walked, guards recursive templates
}

function rootPath(operand: Operand, atRoot: boolean): string | undefined {
  if (operand.kind === 'field' && atRoot) {
    return operand.path.join('.');
  }
  if (operand.kind === 'variable' && operand.name === '$' && operand.path.length > 0) {
    return operand.path.join('.');
  }
  return undefined;
}

function collectFromPipeline(
  pipeline: Pipeline,
  atRoot: boolean,
  state: Collection,
  printed = false
): void {
  const [single] = pipeline.commands;
  const alone =
    printed &&
    pipeline.declarations.length === 0 &&
    pipeline.commands.length === 1 &&
    single.operands.length === 1;

  for (const command of pipeline.commands) {
    for (const operand of command.operands) {
      const path = rootPath(operand, atRoot);
      if (path !== undefined) {
        state.refs.push({ path, printed: alone });
      } else if (operand.kind === 'pipeline') {
        collectFromPipeline(operand.pipeline, atRoot, state);
      }
    }
  }
}

// True when the pipeline hands the root context itself to an included template
function passesRoot(pipeline: Pipeline | undefined, atRoot: boolean): boolean {
  if (!pipeline || pipeline.declarations.length > 0 || pipeline.commands.length !== 1) {
    return false;
  }
  const [command] = pipeline.commands;
  if (command.operands.length !== 1) return false;
  const [operand] = command.operands;
  return (
    (operand.kind === 'dot' && atRoot) ||
    (operand.kind === 'variable' && operand.name === '$' && operand.path.length === 0)
  );
}

// Field references only count while dot is still the root context;
// range and with bodies rebind it.
function collectFromNodes(nodes: TemplateNode[], atRoot: boolean, state: Collection): void {
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        break;
      case 'action':
        collectFromPipeline(node.pipeline, atRoot, state, true);
        break;
      case 'if':
        collectFromPipeline(node.pipeline, atRoot, state);
        collectFromNodes(node.body, atRoot, state);
        collectFromNodes(node.otherwise ?? [], atRoot, state);
        break;
      case 'range':
      case 'with':
        collectFromPipeline(node.pipeline, atRoot, state);
        collectFromNodes(node.body, false, state);
        collectFromNodes(node.otherwise ?? [], atRoot, state);
        break;
      case 'template': {
        if (node.pipeline) collectFromPipeline(node.pipeline, atRoot, state);
        // A define or block body reads the root only when it is handed the root
        const body = state.template.defines.get(node.name);
        if (body && passesRoot(node.pipeline, atRoot) && !state.including.has(node.name)) {
          state.including.add(node.name);
          collectFromNodes(body, true, state);
          state.including.delete(node.name);
        }
        break;
      }
    }
  }
}

function collectReferences(template: ParsedTemplate): Reference[] {
  const state: Collection = { template, refs: [], including: new Set() };
  collectFromNodes(template.root, true, state);

  const merged = new Map<string, Reference>();
  for (const ref of state.refs) {
    const seen = merged.get(ref.path);
    merged.set(ref.path, { path: ref.path, printed: ref.printed || (seen?.printed ?? false) });
  }
  return [...merged.values()];
}

/**
 * Distinct data paths a template reads from the root context, in order of appearance.
 * Bodies of defines and blocks count where they are included with the root as data.
 */
export function referencedPaths(template: ParsedTemplate): string[] {
  return collectReferences(template).map((ref) => ref.path);
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Expand shorthand, parse and execute a document against a variable context.
 *
 * Root references that do not resolve to a leaf render as empty text and are
 * reported once each as warnings to `options.diagnostics`. A mapping counts as
 * unresolved where it would be printed; passing one to range, with or a
 * function is fine.
 *
 * @throws TemplateParseError for syntax errors
 * @throws TemplateExecutionError for evaluation errors
 * @throws ResolutionError for missing or circular partials
 *
 * @example
 * ```typescript
 * const sink = new DiagnosticCollector();
 * renderTemplate('Hello {{name}}!', {}, { diagnostics: sink });
 * // => 'Hello !', with one warning in sink
 * ```
 */
export function renderTemplate(
  text: string,
  context: VariableContext,
  options: RenderOptions = {}
): string {
  if (text === '') {
    return '';
  }

  const name = options.file ?? 'template';
  const template = parseTemplate(preprocessShorthand(text), name);

  if (options.diagnostics) {
    for (const { path, printed } of collectReferences(template)) {
      const value = getByPath(context, path);
      if (value === undefined || (printed && isContext(value))) {
        options.diagnostics.report({
          severity: 'warning',
          message: `unresolved template variable: {{.${path}}}`,
          file: options.file,
        });
      }
    }
  }

  return executeTemplate(template, context, { partials: options.partials, printMappings: false });
}

/**
 * Check that a document parses, without rendering it
 *
 * @throws TemplateParseError for syntax errors
 */
export function checkTemplateSyntax(text: string, file?: string): void {
  parseTemplate(preprocessShorthand(text), file ?? 'template');
}
