import { ExternalCommandError, errorMessage } from '../errors.js';
import { setByPath, type VariableContext } from '../flux/context.js';
import type { DiscoverySpec } from '../manifest/schema.js';
import { executeTemplate } from '../render/exec.js';
import { parseTemplate } from '../render/parser.js';
import type { Logger } from '../types.js';
import { ShellCommandRunner, type CommandRunner } from './command-runner.js';

/** Printed in place of missing keys when expanding a command */
export const NO_VALUE = '<no value>';

/**
 * One selectable option produced by a discovery command
 */
export interface DiscoveryOption {
  label: string;
  value: string;
  extra: string[]; // segments after label|value, addressed by also_sets
}

/**
 * Split `label|value|extra...` lines. Blank lines are skipped; a line without
 * a delimiter is both label and value.
 */
export function parseOptionLines(output: string): DiscoveryOption[] {
  const options: DiscoveryOption[] = [];

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (line === '') continue;

    const parts = line.split('|').map((part) => part.trim());
    if (parts.length === 1) {
      options.push({ label: line, value: line, extra: [] });
    } else {
      const [label, value, ...extra] = parts;
      options.push({ label, value, extra });
    }
  }

  return options;
}

/**
 * Copy the selected option's extra fields into the context, as mapped by
 * `also_sets` (variable name to 0-based index into `extra`). Out-of-range
 * indexes and unknown selections leave the context as it was.
 */
export function applyAlsoSets(
  spec: DiscoverySpec,
  options: DiscoveryOption[],
  selectedValue: string,
  context: VariableContext
): VariableContext {
  if (selectedValue === '') return context;

  const selected = options.find((option) => option.value === selectedValue);
  if (!selected) return context;

  let result = context;
  for (const [name, index] of Object.entries(spec.also_sets)) {
    const value = selected.extra[index];
    if (value !== undefined) {
      result = setByPath(result, name, value);
    }
  }
  return result;
}

/**
 * DiscoveryExecutor - Enumerates candidate values for a variable by running a command
 *
 * @example
 * ```typescript
 * const executor = new DiscoveryExecutor();
 * const options = await executor.run(
 *   { command: 'gh project list --owner {{.org}}', prompt: 'select', also_sets: {} },
 *   { org: 'acme' }
 * );
 * ```
 */
export class DiscoveryExecutor {
  private runner: CommandRunner;
  private logger?: Logger;

  constructor(runner?: CommandRunner, logger?: Logger) {
    this.runner = runner ?? new ShellCommandRunner();
    this.logger = logger;
  }

  /**
   * Expand the command against `context`, run it and parse its output
   *
   * @throws ExternalCommandError if expansion, execution or parsing fails
   */
  async run(spec: DiscoverySpec, context: VariableContext): Promise<DiscoveryOption[]> {
    const command = this.expand(spec.command, 'discover', context, spec.command);

    this.logger?.debug(`Running discovery command: ${command}`);
    const result = await this.runner.run(command);

    if (!result.success) {
      const detail = result.stderr === '' ? '' : `: ${result.stderr}`;
      throw new ExternalCommandError(
        `running discover command: ${result.error ?? 'command failed'}${detail}`,
        command,
        { stderr: result.stderr }
      );
    }

    if (spec.parse === undefined || spec.parse === '') {
      return parseOptionLines(result.stdout);
    }

    let data: unknown;
    try {
      data = JSON.parse(result.stdout);
    } catch (error) {
      throw new ExternalCommandError(
        `parsing discover output as JSON: ${errorMessage(error)}`,
        command,
        { cause: error }
      );
    }

    return parseOptionLines(this.expand(spec.parse, 'parse', data, command));
  }

  private expand(source: string, name: string, data: unknown, command: string): string {
    try {
      return executeTemplate(parseTemplate(source, name), data, { missingValue: NO_VALUE });
    } catch (error) {
      throw new ExternalCommandError(
        `expanding ${name} template: ${errorMessage(error)}`,
        command,
        { cause: error }
      );
    }
  }
}

