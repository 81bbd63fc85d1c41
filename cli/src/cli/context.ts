/**
 * Shared state passed to every command handler
 */

export interface CommandContext {
  /** Directory searched for the default config file */
  cwd: string;
  /** Config file given with --config */
  configPath?: string;
  jsonOutput: boolean;
}
