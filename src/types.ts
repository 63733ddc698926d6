/**
 * Shared types
 */

/**
 * Progress reporting: message plus optional completed/total counters
 */
export type ProgressCallback = (
  message: string,
  progress?: number,
  total?: number
) => void | Promise<void>;

/**
 * Envelope returned by every MCP tool handler
 */
export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
