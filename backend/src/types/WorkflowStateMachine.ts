import { WorkflowEvent, WorkflowState } from './WorkflowEnums';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Allowed transitions. Failed calls have no event: the state simply stays put.
 */
const workflowTransitions: Record<WorkflowState, Partial<Record<WorkflowEvent, WorkflowState>>> = {
  [WorkflowState.IDLE]: {
    [WorkflowEvent.UPLOAD_AUDIO]: WorkflowState.UPLOADED,
  },
  [WorkflowState.UPLOADED]: {
    [WorkflowEvent.UPLOAD_AUDIO]: WorkflowState.UPLOADED,
    [WorkflowEvent.TRANSCRIPTION_SUCCEEDED]: WorkflowState.TRANSCRIBED,
  },
  [WorkflowState.TRANSCRIBED]: {
    [WorkflowEvent.UPLOAD_AUDIO]: WorkflowState.UPLOADED,
    [WorkflowEvent.TRANSCRIPTION_SUCCEEDED]: WorkflowState.TRANSCRIBED,
    [WorkflowEvent.TRANSLATION_SUCCEEDED]: WorkflowState.TRANSLATED,
  },
  [WorkflowState.TRANSLATED]: {
    [WorkflowEvent.UPLOAD_AUDIO]: WorkflowState.UPLOADED,
    [WorkflowEvent.TRANSCRIPTION_SUCCEEDED]: WorkflowState.TRANSCRIBED,
    [WorkflowEvent.TRANSLATION_SUCCEEDED]: WorkflowState.TRANSLATED,
  },
};

export class WorkflowStateMachine {
  private state: WorkflowState;
  private readonly logger: Logger;

  constructor(initialState: WorkflowState = WorkflowState.IDLE, logger: Logger = silentLogger) {
    this.state = initialState;
    this.logger = logger;
  }

  getState(): WorkflowState {
    return this.state;
  }

  can(event: WorkflowEvent): boolean {
    return workflowTransitions[this.state][event] !== undefined;
  }

  /**
   * Applies `event` and returns the resulting state.
   * Throws when the event is not allowed from the current state.
   */
  dispatch(event: WorkflowEvent): WorkflowState {
    const next = workflowTransitions[this.state][event];
    if (next === undefined) {
      throw new Error(`Event ${event} is not allowed in state ${this.state}`);
    }
    if (next !== this.state) {
      this.logger.debug(`Workflow state transition: ${this.state} -> ${next}`);
    }
    this.state = next;
    return next;
  }
}
