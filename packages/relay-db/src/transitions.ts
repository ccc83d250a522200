import { TOOL_RUN_STATUSES, type InputType, type TaskStatus, type ToolRunStatus } from './types.js';

export const TASK_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  RECEIVED: ['ROUTED', 'FAILED'],
  ROUTED: ['TRANSCRIBING', 'REFINING', 'FAILED'],
  TRANSCRIBING: ['REFINING', 'FAILED'],
  REFINING: ['TOOL_QUEUED', 'FAILED'],
  TOOL_QUEUED: ['TOOL_RUNNING', 'FAILED'],
  TOOL_RUNNING: ['SUMMARIZING', 'FAILED'],
  SUMMARIZING: ['TTS_GENERATING', 'DELIVERED', 'FAILED'],
  TTS_GENERATING: ['DELIVERED', 'FAILED'],
  DELIVERED: [],
  FAILED: []
};

// A run that never started may still be failed (sweep, lost parent transition).
export const TOOL_RUN_TRANSITIONS: Readonly<Record<ToolRunStatus, readonly ToolRunStatus[]>> = {
  QUEUED: ['RUNNING', 'FAILED'],
  RUNNING: ['SUCCEEDED', 'FAILED'],
  SUCCEEDED: [],
  FAILED: []
};

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['DELIVERED', 'FAILED'];
export const ACTIVE_TOOL_RUN_STATUSES: readonly ToolRunStatus[] = ['QUEUED', 'RUNNING'];

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function canTransitionToolRun(from: ToolRunStatus, to: ToolRunStatus): boolean {
  return TOOL_RUN_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export function isTerminalToolRunStatus(status: ToolRunStatus): boolean {
  return !ACTIVE_TOOL_RUN_STATUSES.includes(status);
}

/** Statuses a tool run may be in right before moving to `to`. */
export function toolRunPredecessors(to: ToolRunStatus): ToolRunStatus[] {
  return TOOL_RUN_STATUSES.filter(from => canTransitionToolRun(from, to));
}

/** The happy path a task of the given input kind walks, RECEIVED to DELIVERED. */
export function plannedPath(inputType: InputType): TaskStatus[] {
  if (inputType === 'voice') {
    return ['RECEIVED', 'ROUTED', 'TRANSCRIBING', 'REFINING', 'TOOL_QUEUED', 'TOOL_RUNNING', 'SUMMARIZING', 'TTS_GENERATING', 'DELIVERED'];
  }
  return ['RECEIVED', 'ROUTED', 'REFINING', 'TOOL_QUEUED', 'TOOL_RUNNING', 'SUMMARIZING', 'DELIVERED'];
}

export interface HistoryStep {
  from_status: TaskStatus | null;
  to_status: TaskStatus;
}

/**
 * True when the entries, in order, form one walk through the declared edges
 * starting with the initial null -> RECEIVED entry.
 */
export function isValidHistoryPath(history: readonly HistoryStep[]): boolean {
  if (history.length === 0) {
    return false;
  }
  const [first, ...rest] = history;
  if (first.from_status !== null || first.to_status !== 'RECEIVED') {
    return false;
  }
  let current: TaskStatus = first.to_status;
  for (const step of rest) {
    if (step.from_status !== current || !canTransition(current, step.to_status)) {
      return false;
    }
    current = step.to_status;
  }
  return true;
}
