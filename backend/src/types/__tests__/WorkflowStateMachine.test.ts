import { WorkflowEvent, WorkflowState } from '../WorkflowEnums';
import { WorkflowStateMachine } from '../WorkflowStateMachine';

describe('WorkflowStateMachine', () => {
  it('should start idle', () => {
    expect(new WorkflowStateMachine().getState()).toBe(WorkflowState.IDLE);
  });

  it('should walk the upload, transcribe, translate path', () => {
    const machine = new WorkflowStateMachine();

    expect(machine.dispatch(WorkflowEvent.UPLOAD_AUDIO)).toBe(WorkflowState.UPLOADED);
    expect(machine.dispatch(WorkflowEvent.TRANSCRIPTION_SUCCEEDED)).toBe(WorkflowState.TRANSCRIBED);
    expect(machine.dispatch(WorkflowEvent.TRANSLATION_SUCCEEDED)).toBe(WorkflowState.TRANSLATED);
  });

  it('should go back to uploaded on a new upload from any state', () => {
    for (const state of [WorkflowState.UPLOADED, WorkflowState.TRANSCRIBED, WorkflowState.TRANSLATED]) {
      const machine = new WorkflowStateMachine(state);
      expect(machine.dispatch(WorkflowEvent.UPLOAD_AUDIO)).toBe(WorkflowState.UPLOADED);
    }
  });

  it('should return to transcribed when a translated session is transcribed again', () => {
    const machine = new WorkflowStateMachine(WorkflowState.TRANSLATED);
    expect(machine.dispatch(WorkflowEvent.TRANSCRIPTION_SUCCEEDED)).toBe(WorkflowState.TRANSCRIBED);
  });

  it('should reject events that skip a step', () => {
    const idle = new WorkflowStateMachine();
    expect(idle.can(WorkflowEvent.TRANSCRIPTION_SUCCEEDED)).toBe(false);
    expect(() => idle.dispatch(WorkflowEvent.TRANSCRIPTION_SUCCEEDED)).toThrow(
      'Event transcription_succeeded is not allowed in state idle'
    );
    expect(idle.getState()).toBe(WorkflowState.IDLE);

    const uploaded = new WorkflowStateMachine(WorkflowState.UPLOADED);
    expect(uploaded.can(WorkflowEvent.TRANSLATION_SUCCEEDED)).toBe(false);
  });
});
