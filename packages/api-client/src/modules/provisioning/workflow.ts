/**
 * Server-creation wizard: a linear state machine over the stage handlers.
 *
 *   basics → owner → node → family → template → image → allocation → resources → review
 *
 * - a ValidationError keeps the wizard on the same stage with the same session
 * - any other console error during a lookup ends the wizard (`aborted`)
 * - review either commits (`created` / `failed`) or cancels (`cancelled`)
 * - once the commit request is sent the wizard can no longer be cancelled
 */
import { silentLogger, type Logger } from '../../lib/logger.js';
import {
  ApiError,
  PanelError,
  ValidationError,
  WorkflowStateError,
} from '../../types/index.js';
import type { PanelClient } from '../resources/client.js';
import { basicsPrompt, type StageId, type StageInput, type StagePrompt } from './prompts.js';
import type { CreationSession } from './session.js';
import {
  commit,
  selectAllocation,
  selectFamily,
  selectImage,
  selectNode,
  selectOwner,
  selectTemplate,
  submitBasics,
  submitResources,
  type CreatedServer,
  type StageAdvance,
} from './stages.js';

export type WorkflowStep =
  | { status: 'awaiting-input'; stage: StageId; prompt: StagePrompt }
  | { status: 'invalid-input'; stage: StageId; prompt: StagePrompt; message: string; field?: string }
  | { status: 'aborted'; stage: StageId; message: string }
  | { status: 'created'; server: CreatedServer }
  | { status: 'failed'; statusCode: number | null; message: string }
  | { status: 'cancelled' };

export type TerminalStatus = 'aborted' | 'created' | 'failed' | 'cancelled';

export function isTerminal(step: WorkflowStep): step is Extract<WorkflowStep, { status: TerminalStatus }> {
  return (
    step.status === 'aborted' ||
    step.status === 'created' ||
    step.status === 'failed' ||
    step.status === 'cancelled'
  );
}

type ChoiceHandler = (
  client: PanelClient,
  session: CreationSession,
  value: string,
) => Promise<StageAdvance>;

const CHOICE_HANDLERS: Partial<Record<StageId, ChoiceHandler>> = {
  owner: selectOwner,
  node: selectNode,
  family: selectFamily,
  template: selectTemplate,
  image: selectImage,
  allocation: selectAllocation,
};

export class CreationWorkflow {
  private prompt: StagePrompt = basicsPrompt();
  private session: CreationSession | null = null;
  private finished = false;
  /** Terminal step once known; stays `null` while a commit is in flight. */
  private outcome: WorkflowStep | null = null;
  private readonly log: Logger;

  constructor(
    private readonly client: PanelClient,
    logger: Logger = silentLogger,
  ) {
    this.log = logger;
  }

  get stage(): StageId {
    return this.prompt.stage;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Session collected so far; `null` until basics are accepted. */
  get snapshot(): CreationSession | null {
    return this.session;
  }

  current(): WorkflowStep {
    return { status: 'awaiting-input', stage: this.stage, prompt: this.prompt };
  }

  async submit(input: StageInput): Promise<WorkflowStep> {
    if (this.finished) {
      throw new WorkflowStateError('This server creation wizard has already finished.');
    }

    const stage = this.stage;
    try {
      if (input.kind === 'review') {
        return await this.review(input.action);
      }
      const advance = await this.advance(input);
      if (this.outcome !== null) return this.outcome;
      this.session = advance.session;
      this.prompt = advance.prompt;
      this.log.debug({ from: stage, to: advance.prompt.stage }, 'wizard stage advanced');
      return this.current();
    } catch (err) {
      if (this.outcome !== null && err instanceof PanelError) return this.outcome;
      if (err instanceof ValidationError) {
        return {
          status: 'invalid-input',
          stage,
          prompt: this.prompt,
          message: err.message,
          field: err.field,
        };
      }
      if (err instanceof PanelError) {
        this.log.info({ stage, err: err.message }, 'wizard aborted');
        return this.finish({ status: 'aborted', stage, message: err.message });
      }
      throw err;
    }
  }

  /**
   * Ends the wizard from any stage. A wizard that already ended reports how
   * it ended; one whose commit is in flight refuses.
   */
  cancel(): WorkflowStep {
    if (this.outcome !== null) return this.outcome;
    if (this.finished) {
      throw new WorkflowStateError('The server is already being created and can no longer be cancelled.');
    }
    this.log.debug({ stage: this.stage }, 'wizard cancelled');
    return this.finish({ status: 'cancelled' });
  }

  private finish(step: WorkflowStep): WorkflowStep {
    this.finished = true;
    this.outcome = step;
    return step;
  }

  private async advance(input: Exclude<StageInput, { kind: 'review' }>): Promise<StageAdvance> {
    const prompt = this.prompt;

    if (input.kind === 'form') {
      if (prompt.kind !== 'form') throw this.wrongKind('form');
      const values: Record<string, string> = {};
      for (const field of prompt.fields) values[field.name] = field.defaultValue;
      Object.assign(values, input.values);

      if (prompt.stage === 'basics') return submitBasics(this.client, values);
      return submitResources(this.client, this.requireSession(), values);
    }

    if (prompt.kind !== 'choice') throw this.wrongKind('choice');
    if (!prompt.options.some((option) => option.value === input.value)) {
      throw new ValidationError(`'${input.value}' is not one of the offered options.`);
    }
    const handler = CHOICE_HANDLERS[prompt.stage];
    if (handler === undefined) {
      throw new WorkflowStateError(`Stage ${prompt.stage} does not take a choice.`);
    }
    return handler(this.client, this.requireSession(), input.value);
  }

  private async review(action: 'commit' | 'cancel'): Promise<WorkflowStep> {
    if (this.prompt.kind !== 'review') throw this.wrongKind('review');
    if (action === 'cancel') return this.cancel();

    const session = this.requireSession();
    this.finished = true;
    try {
      const server = await commit(this.client, session);
      this.log.info({ serverId: server.id, uuid: server.uuid }, 'server created');
      return this.finish({ status: 'created', server });
    } catch (err) {
      if (!(err instanceof PanelError)) throw err;
      this.log.warn({ err: err.message }, 'server creation failed');
      return this.finish({
        status: 'failed',
        statusCode: err instanceof ApiError ? err.statusCode : null,
        message: err.message,
      });
    }
  }

  private requireSession(): CreationSession {
    if (this.session === null) throw new WorkflowStateError('Basics have not been submitted yet.');
    return this.session;
  }

  private wrongKind(kind: StageInput['kind']): ValidationError {
    return new ValidationError(
      `Stage ${this.stage} expects a ${this.prompt.kind} answer, not a ${kind} answer.`,
    );
  }
}
