/**
 * Holds the creation wizards that are in progress, one per session id.
 * A wizard is dropped when it finishes, when it sits idle past the timeout,
 * or on `closeAll()`.
 */
import { randomUUID } from 'crypto';
import { silentLogger, type Logger } from '../../lib/logger.js';
import { WorkflowStateError } from '../../types/index.js';
import type { StageInput } from './prompts.js';
import type { CreationWorkflow, WorkflowStep } from './workflow.js';

export interface WizardSessionStoreOptions {
  idleTimeoutMs: number;
  createWorkflow: () => CreationWorkflow;
  logger?: Logger;
}

interface WizardEntry {
  workflow: CreationWorkflow;
  timer: NodeJS.Timeout | null;
  busy: boolean;
}

export class WizardSessionStore {
  private readonly sessions = new Map<string, WizardEntry>();
  private readonly log: Logger;

  constructor(private readonly options: WizardSessionStoreOptions) {
    this.log = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  start(): { sessionId: string; step: WorkflowStep } {
    const sessionId = `wiz-${randomUUID()}`;
    const entry: WizardEntry = { workflow: this.options.createWorkflow(), timer: null, busy: false };
    this.sessions.set(sessionId, entry);
    this.arm(sessionId, entry);
    this.log.debug({ sessionId }, 'wizard started');
    return { sessionId, step: entry.workflow.current() };
  }

  /** Current prompt of a live wizard, without touching its idle timer. */
  peek(sessionId: string): WorkflowStep {
    return this.require(sessionId).workflow.current();
  }

  async answer(sessionId: string, input: StageInput): Promise<WorkflowStep> {
    const entry = this.require(sessionId);
    if (entry.busy) {
      throw new WorkflowStateError('The previous answer for this wizard is still being processed.');
    }

    entry.busy = true;
    this.disarm(entry);
    try {
      return await entry.workflow.submit(input);
    } finally {
      entry.busy = false;
      if (entry.workflow.isFinished) {
        this.sessions.delete(sessionId);
      } else if (this.sessions.get(sessionId) === entry) {
        this.arm(sessionId, entry);
      }
    }
  }

  cancel(sessionId: string): WorkflowStep {
    const entry = this.require(sessionId);
    if (entry.busy) {
      throw new WorkflowStateError(
        'An answer for this wizard is still being processed; cancel once it has finished.',
      );
    }
    this.disarm(entry);
    this.sessions.delete(sessionId);
    return entry.workflow.cancel();
  }

  /** Cancels every live wizard; used at shutdown. A commit in flight is left to finish. */
  closeAll(): void {
    for (const [sessionId, entry] of this.sessions) {
      this.disarm(entry);
      if (!entry.workflow.isFinished) entry.workflow.cancel();
      this.log.debug({ sessionId }, 'wizard closed at shutdown');
    }
    this.sessions.clear();
  }

  private require(sessionId: string): WizardEntry {
    const entry = this.sessions.get(sessionId);
    if (entry === undefined) {
      throw new WorkflowStateError(
        `No server creation wizard with id ${sessionId}. It may have timed out; start a new one.`,
      );
    }
    return entry;
  }

  private arm(sessionId: string, entry: WizardEntry): void {
    entry.timer = setTimeout(() => {
      this.sessions.delete(sessionId);
      entry.workflow.cancel();
      this.log.debug({ sessionId }, 'wizard expired');
    }, this.options.idleTimeoutMs);
    entry.timer.unref();
  }

  private disarm(entry: WizardEntry): void {
    if (entry.timer !== null) clearTimeout(entry.timer);
    entry.timer = null;
  }
}
