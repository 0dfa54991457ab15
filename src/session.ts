import type { PipelineStageName, PipelineState, PipelineTransition } from './types/pipeline.js';
import { createLogger } from './logger.js';

export type TransitionListener = (transition: PipelineTransition, session: PipelineSession) => void | Promise<void>;

export class IllegalTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition: ${describeState(from)} -> ${describeState(to)}`);
    this.name = 'IllegalTransitionError';
  }
}

const NEXT_STAGES: Record<PipelineStageName, readonly PipelineStageName[]> = {
  idle: ['extracting', 'failed'],
  extracting: ['transcribing', 'failed'],
  transcribing: ['translating', 'failed'],
  translating: ['translating', 'done', 'failed'],
  done: [],
  failed: [],
};

const logger = createLogger('session');

export function describeState(state: PipelineState): string {
  switch (state.stage) {
    case 'translating':
      return `translating(${state.completed}/${state.total})`;
    case 'failed':
      return `failed(${state.failedStage})`;
    default:
      return state.stage;
  }
}

function isValidStep(from: PipelineState, to: PipelineState): boolean {
  if (!NEXT_STAGES[from.stage].includes(to.stage)) {
    return false;
  }
  if (to.stage === 'failed') {
    // A run that never started can only fail at its first stage
    const origin = from.stage === 'idle' ? 'extracting' : from.stage;
    return to.failedStage === origin;
  }
  if (to.stage === 'translating') {
    if (from.stage === 'translating') {
      return to.total === from.total && to.completed === from.completed + 1;
    }
    return to.completed === 0;
  }
  if (to.stage === 'done') {
    return from.stage === 'translating' && from.completed === from.total;
  }
  return true;
}

/**
 * State of one pipeline run. Transitions are strictly sequential; every
 * accepted transition is recorded and handed to the listener.
 */
export class PipelineSession {
  private current: PipelineState = { stage: 'idle' };
  private readonly history: PipelineTransition[] = [];
  readonly startedAt: number;

  constructor(
    readonly runId: string,
    private readonly listener?: TransitionListener,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  get state(): PipelineState {
    return this.current;
  }

  get transitions(): readonly PipelineTransition[] {
    return this.history;
  }

  get isTerminal(): boolean {
    return this.current.stage === 'done' || this.current.stage === 'failed';
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  async transition(next: PipelineState): Promise<void> {
    const from = this.current;
    if (!isValidStep(from, next)) {
      throw new IllegalTransitionError(from, next);
    }

    // State changes before the listener runs so concurrent callers see it
    const transition: PipelineTransition = { from, to: next, at: new Date(this.now()).toISOString() };
    this.current = next;
    this.history.push(transition);
    logger.debug('Pipeline transition', { runId: this.runId, from: describeState(from), to: describeState(next) });

    if (!this.listener) return;
    try {
      await this.listener(transition, this);
    } catch (error) {
      logger.warn('Transition listener failed', { runId: this.runId, error });
    }
  }
}
