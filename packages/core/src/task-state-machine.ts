import type { TaskState } from '@a2a-relay/protocol';

export const VALID_TRANSITIONS: Record<TaskState, TaskState[]> = {
  submitted: ['working', 'canceled'],
  working: ['completed', 'failed', 'canceled'],
  completed: [], // terminal state
  failed: [], // terminal state
  canceled: [], // terminal state
};

export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function getValidTransitions(state: TaskState): TaskState[] {
  return VALID_TRANSITIONS[state];
}

export function isCancelable(state: TaskState): boolean {
  return isValidTransition(state, 'canceled');
}

export interface TaskStateEvent {
  taskId: string;
  correlationId: string;
  from: TaskState;
  to: TaskState;
  timestamp: Date;
}

export type TaskTransitionListener = (event: TaskStateEvent) => void;

export class TaskStateMachine {
  private listeners: TaskTransitionListener[] = [];

  onTransition(listener: TaskTransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  emitTransition(event: TaskStateEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
