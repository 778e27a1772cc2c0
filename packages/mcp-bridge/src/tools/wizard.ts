/**
 * Server-creation wizard tools. A wizard lives in the console's session
 * store between calls; each answer returns the next prompt or the outcome.
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ValidationError, type PanelConsole, type StageInput } from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

const sessionId = z.string().min(1).describe('Wizard id returned by servers_create_start');

interface AnswerArgs {
  value?: string | undefined;
  values?: Record<string, string> | undefined;
  action?: 'commit' | 'cancel' | undefined;
}

/** Exactly one of `value`, `values` or `action` must be given. */
export function toStageInput({ value, values, action }: AnswerArgs): StageInput {
  const given = [value, values, action].filter((a) => a !== undefined).length;
  if (given !== 1) {
    throw new ValidationError('Answer with exactly one of value, values or action.');
  }
  if (action !== undefined) return { kind: 'review', action };
  if (values !== undefined) return { kind: 'form', values };
  return { kind: 'choice', value: value ?? '' };
}

export function registerWizardTools(server: McpServer, { wizards }: PanelConsole) {
  server.tool(
    'servers_create_start',
    'Start the server-creation wizard; returns its id and the first prompt',
    {},
    async () => runTool('servers_create_start', async () => wizards.start()),
  );

  server.tool(
    'servers_create_answer',
    'Answer the current wizard prompt: `values` for a form, `value` for a choice, `action` on review',
    {
      sessionId,
      value: z.string().optional().describe('Chosen option value'),
      values: z.record(z.string()).optional().describe('Form field values by field name'),
      action: z.enum(['commit', 'cancel']).optional().describe('Review decision'),
    },
    async ({ sessionId: id, ...answer }) =>
      runTool('servers_create_answer', () => wizards.answer(id, toStageInput(answer))),
  );

  server.tool(
    'servers_create_status',
    'Show the current prompt of a wizard',
    { sessionId },
    async ({ sessionId: id }) => runTool('servers_create_status', async () => wizards.peek(id)),
  );

  server.tool(
    'servers_create_cancel',
    'Abandon a wizard',
    { sessionId },
    async ({ sessionId: id }) => runTool('servers_create_cancel', async () => wizards.cancel(id)),
  );
}
