/**
 * Progress event interfaces for Income Verification MCP System
 *
 * Ordered step records emitted by one verification run for interactive callers.
 */

/**
 * Lifecycle of a single verification run.
 * ERROR is only reachable from EXTRACTING; COMPARING always completes.
 */
export type RunState = 'PENDING' | 'EXTRACTING' | 'COMPARING' | 'VERIFIED' | 'MISMATCH' | 'ERROR';

export type ProgressStep =
  | 'starting'
  | 'downloading'
  | 'extracting'
  | 'extracted'
  | 'verifying_name'
  | 'verifying_salary'
  | 'verifying_employer'
  | 'finalizing'
  | 'complete'
  | 'error';

/** Fixed progress percentage for each step */
export const STEP_PROGRESS: Record<ProgressStep, number> = {
  starting: 0,
  downloading: 20,
  extracting: 40,
  extracted: 60,
  verifying_name: 70,
  verifying_salary: 80,
  verifying_employer: 90,
  finalizing: 95,
  complete: 100,
  error: 0,
};

/** Emission order of a run that does not fail */
export const STEP_ORDER: readonly ProgressStep[] = [
  'starting',
  'downloading',
  'extracting',
  'extracted',
  'verifying_name',
  'verifying_salary',
  'verifying_employer',
  'finalizing',
  'complete',
] as const;

export interface ProgressEvent {
  step: ProgressStep;
  message: string;
  progress_percent: number;
  error: boolean;
  payload?: Record<string, unknown>;
}
