import { UserError } from 'fastmcp';
import { isSlidesError } from '../types.js';

interface ToolLog {
  error(message: string): void;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs the failure and rethrows it as a UserError, so the calling agent sees
 * `Failed to <action>: <reason>` rather than an internal error.
 */
export function failTool(action: string, error: unknown, log: ToolLog): never {
  const message = errorMessage(error);
  const kind = isSlidesError(error) ? error.kind : 'Unexpected';
  log.error(`[${kind}] Failed to ${action}: ${message}`);
  if (error instanceof UserError) throw error;
  throw new UserError(`Failed to ${action}: ${message}`);
}
