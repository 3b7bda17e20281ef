/**
 * CLI Types - Shared type definitions for CLI commands
 */

/**
 * Result of a command execution
 */
export interface CommandResult {
  success: boolean;
  data?: string | object;
  error?: string;
}

/**
 * Settings shared by every command
 */
export interface CommandConfig {
  json: boolean;
  dataDir: string;
  /** Default seed when a command is given none; 0 = process-wide generator */
  seed: number;
}

export type Command = (args: string[], config: CommandConfig) => Promise<CommandResult>;
