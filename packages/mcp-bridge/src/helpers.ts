/** Shared MCP response helpers. */
import { describeError, PanelError } from '@hostpanel/api-client';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function ok(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function err(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Runs a tool body and reports console failures as `<tool> failed: <reason>`.
 * Anything that is not a console error is a bug and is rethrown.
 */
export async function runTool(tool: string, body: () => Promise<unknown>): Promise<ToolResult> {
  try {
    return ok(await body());
  } catch (e) {
    if (e instanceof PanelError) return err(`${tool} failed: ${describeError(e)}`);
    throw e;
  }
}
