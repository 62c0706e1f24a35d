import { EventEmitter } from 'eventemitter3';
import { DiagnosticCollector } from '../diagnostics.js';
import { errorMessage } from '../errors.js';
import type { VariableContext } from '../flux/context.js';
import { assertValidFlux, resolveFlux } from '../flux/resolver.js';
import { createConsoleLogger } from '../logger.js';
import type { Bundle } from '../manifest/loader.js';
import { resolveOutput } from '../output/mapper.js';
import { PartialResolver } from '../partials/resolver.js';
import { renderTemplate } from '../render/renderer.js';
import type { FileTree } from '../tree/file-tree.js';
import type { Diagnostic, Logger, LogLevel, RenderedFile, ResolvedFile } from '../types.js';

/**
 * Caster configuration
 */
export interface CasterConfig {
  logger?: Logger;
  logLevel?: LogLevel;
  /** Extra partial search roots, consulted after the bundle's own tree */
  partialRoots?: FileTree[];
}

export interface CastInput {
  values?: VariableContext[]; // user values files, lowest precedence first
  overrides?: string[]; // dotted.key=value
}

export interface CastResult {
  context: VariableContext;
  files: RenderedFile[];
  diagnostics: DiagnosticCollector;
}

export interface CasterEvents {
  'file:rendered': (file: RenderedFile) => void;
  'file:failed': (file: ResolvedFile, error: Error) => void;
  diagnostic: (diagnostic: Diagnostic) => void;
}

/**
 * Collector that also forwards each diagnostic as an event
 */
class EmittingCollector extends DiagnosticCollector {
  constructor(private readonly emitter: EventEmitter<CasterEvents>) {
    super();
  }

  override report(diagnostic: Diagnostic): void {
    super.report(diagnostic);
    this.emitter.emit('diagnostic', { ...diagnostic });
  }
}

/**
 * BundleCaster - Renders one bundle into its output files
 *
 * One cast is a sequential pass: variables are resolved and validated once,
 * output paths are mapped, then each processed document is rendered in turn.
 * A document that fails to render is reported and skipped; the rest still cast.
 *
 * @example
 * ```typescript
 * const caster = new BundleCaster({ logLevel: 'debug' });
 * caster.on('file:rendered', (file) => console.log(file.destPath));
 *
 * const bundle = await new BundleLoader().loadFromDirectory('./my-bundle');
 * const result = caster.cast(bundle, { overrides: ['org=acme'] });
 * await writeCastOutput(result, './project');
 * ```
 */
export class BundleCaster extends EventEmitter<CasterEvents> {
  private readonly logger: Logger;
  private readonly partialRoots: FileTree[];

  constructor(config: CasterConfig = {}) {
    super();
    this.logger = config.logger || createConsoleLogger(config.logLevel || 'info');
    this.partialRoots = config.partialRoots || [];
  }

  /**
   * @throws FluxValidationError when resolved variables violate the schema
   * @throws FluxOverrideError for a malformed override
   * @throws ResolutionError when the output mapping names a missing source
   */
  cast(bundle: Bundle, input: CastInput = {}): CastResult {
    const context = resolveFlux({
      schema: bundle.schema,
      defaults: bundle.defaults,
      values: input.values,
      overrides: input.overrides,
    });
    assertValidFlux(bundle.schema, context);

    const resolved = resolveOutput(bundle.output, bundle.tree, { ignore: bundle.ignore });
    this.logger.debug(`Casting ${bundle.manifest.name}: ${resolved.length} files`);

    const diagnostics = new EmittingCollector(this);
    const partials = new PartialResolver({
      roots: [bundle.tree, ...this.partialRoots],
      context,
      diagnostics,
      logger: this.logger,
    });

    const files: RenderedFile[] = [];
    for (const file of resolved) {
      if (!file.process) {
        files.push({ ...file, content: bundle.tree.readBytes(file.srcPath) ?? Buffer.alloc(0) });
        continue;
      }

      const source = bundle.tree.read(file.srcPath) ?? '';

      try {
        const content = renderTemplate(source, context, {
          partials,
          diagnostics,
          file: file.srcPath,
        });
        const rendered = { ...file, content };
        files.push(rendered);
        this.emit('file:rendered', rendered);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(errorMessage(error));
        diagnostics.error(failure.message, file.srcPath);
        this.logger.warn(`Failed to render ${file.srcPath}`, { error: failure.message });
        this.emit('file:failed', file, failure);
      }
    }

    this.logger.info(`Cast ${files.length} of ${resolved.length} files from ${bundle.manifest.name}`);

    return { context, files, diagnostics };
  }
}
