import { InvalidTransitionError } from '../../shared/errors';
import { TERMINAL_STAGES, type Stage } from '../../shared/types';

const FORWARD: Record<Stage, readonly Stage[]> = {
  pending: ['scraping'],
  scraping: ['analyzing', 'failed'],
  analyzing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/** A re-attempt restarts from scraping; the job's own retry loop is the only caller. */
const RETRY: Record<Stage, readonly Stage[]> = {
  pending: [],
  scraping: ['scraping'],
  analyzing: ['scraping'],
  completed: [],
  failed: [],
};

export type TransitionKind = 'advance' | 'retry';

export const isTerminal = (stage: Stage): boolean => TERMINAL_STAGES.includes(stage);

export const canTransition = (from: Stage, to: Stage, kind: TransitionKind = 'advance'): boolean =>
  (kind === 'retry' ? RETRY : FORWARD)[from].includes(to);

export const assertTransition = (from: Stage, to: Stage, kind: TransitionKind = 'advance'): void => {
  if (!canTransition(from, to, kind)) {
    throw new InvalidTransitionError(from, to);
  }
};
