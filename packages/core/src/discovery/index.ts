/**
 * Discovery - command-driven option enumeration
 */

export {
  ShellCommandRunner,
  type CommandConfig,
  type CommandResult,
  type CommandRunner,
} from './command-runner.js';
export {
  DiscoveryExecutor,
  NO_VALUE,
  applyAlsoSets,
  parseOptionLines,
  type DiscoveryOption,
} from './executor.js';
