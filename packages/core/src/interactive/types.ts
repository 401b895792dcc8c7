import type { ExitStatus } from './pty-process.js';

export type { StepResult, KillResult, SessionSummary } from '@termjudge/shared';

export interface DrainResult {
  output: string;
  waiting: boolean;
  finished: boolean;
  exitStatus: ExitStatus | null;
}

export type EscalationState = 'RUNNING' | 'INTERRUPTING' | 'FINISHED' | 'KILLED';

export interface TimeoutEscalated {
  from: EscalationState;
  to: EscalationState;
  at: number;
  reason: string;
}

export type Outcome = 'SUCCESS' | 'FAILURE';
