import { posix } from 'path';
import { ResolutionError, errorMessage } from '../errors.js';
import type { VariableContext } from '../flux/context.js';
import { parsePartialManifest } from '../manifest/parser.js';
import { PARTIALS_DIR, PARTIAL_MANIFEST } from '../manifest/schema.js';
import type { PartialProvider } from '../render/exec.js';
import { renderTemplate } from '../render/renderer.js';
import { normalizeTreePath, type FileTree } from '../tree/file-tree.js';
import type { DiagnosticSink, Logger } from '../types.js';

/**
 * A partial that (transitively) references itself
 */
export class CircularPartialError extends ResolutionError {
  public readonly chain: string[];

  constructor(chain: string[]) {
    super(`circular partial reference detected: ${chain.join(' -> ')}`);
    this.name = 'CircularPartialError';
    this.chain = chain;
  }
}

export class PartialNotFoundError extends ResolutionError {
  public readonly partial: string;
  public readonly searched: string[];

  constructor(partial: string, searched: string[]) {
    super(`partial "${partial}" not found (searched: ${searched.join(', ')})`);
    this.name = 'PartialNotFoundError';
    this.partial = partial;
    this.searched = searched;
  }
}

export interface PartialResolverConfig {
  /** Search roots, highest priority first; each holds a `partials/` directory */
  roots: FileTree[];
  context: VariableContext;
  diagnostics?: DiagnosticSink;
  logger?: Logger;
}

interface PartialSource {
  content: string;
  location: string;
}

/**
 * PartialResolver - Finds and renders named partials across search roots
 *
 * Within a root, `partials/<name>/partial.yaml` (its `files` concatenated in
 * order) wins over `partials/<name>.md`. The first root with a match wins.
 * Partial content is rendered with the same context, so partials may nest;
 * each top-level `resolve` tracks its own in-progress chain to catch cycles.
 *
 * @example
 * ```typescript
 * const resolver = new PartialResolver({ roots: [bundle.tree], context });
 * const text = renderTemplate(doc, context, { partials: resolver });
 * ```
 */
export class PartialResolver implements PartialProvider {
  private readonly config: PartialResolverConfig;

  constructor(config: PartialResolverConfig) {
    this.config = config;
  }

  /**
   * Resolve and render a partial by name
   *
   * @throws CircularPartialError when the partial references itself at any depth
   * @throws PartialNotFoundError when no root contains it
   */
  resolve(name: string): string {
    return this.resolveWithin(name, []);
  }

  private resolveWithin(name: string, stack: readonly string[]): string {
    if (stack.includes(name)) {
      throw new CircularPartialError([...stack.slice(stack.indexOf(name)), name]);
    }

    const source = this.find(name);
    const chain = [...stack, name];
    this.config.logger?.debug(`Resolving partial "${name}" from ${source.location}`);

    // Nested references resolve against this call's chain only
    const nested: PartialProvider = {
      resolve: (child) => this.resolveWithin(child, chain),
    };

    return renderTemplate(source.content, this.config.context, {
      partials: nested,
      diagnostics: this.config.diagnostics,
      file: source.location,
    });
  }

  private find(name: string): PartialSource {
    const base = normalizeTreePath(name);
    if (base === '' || base.split('/').includes('..')) {
      throw new ResolutionError(`invalid partial name "${name}"`);
    }

    for (const root of this.config.roots) {
      const dir = `${PARTIALS_DIR}/${base}`;
      const manifestPath = `${dir}/${PARTIAL_MANIFEST}`;
      const manifest = root.read(manifestPath);
      if (manifest !== undefined) {
        return {
          content: this.concatenate(root, dir, manifest, name),
          location: `${root.label}:${manifestPath}`,
        };
      }

      const barePath = `${PARTIALS_DIR}/${base}.md`;
      const bare = root.read(barePath);
      if (bare !== undefined) {
        return { content: bare, location: `${root.label}:${barePath}` };
      }
    }

    throw new PartialNotFoundError(
      name,
      this.config.roots.map((root) => `${root.label}/${PARTIALS_DIR}`)
    );
  }

  private concatenate(root: FileTree, dir: string, manifestContent: string, name: string): string {
    let files: string[];
    try {
      files = parsePartialManifest(manifestContent, `${dir}/${PARTIAL_MANIFEST}`).files;
    } catch (error) {
      throw new ResolutionError(`parsing partial "${name}" manifest: ${errorMessage(error)}`);
    }

    return files
      .map((file) => {
        const path = normalizeTreePath(posix.join(dir, file));
        if (!path.startsWith(`${dir}/`)) {
          throw new ResolutionError(`partial "${name}" file "${file}" is outside ${dir}`);
        }
        const content = root.read(path);
        if (content === undefined) {
          throw new ResolutionError(`partial "${name}" file "${file}" not found`);
        }
        return content;
      })
      .join('');
  }
}
