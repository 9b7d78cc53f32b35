/**
 * Per-module lifecycle.
 *
 * pending -> scaffolding -> manifesting -> packaging -> (signed | unsigned) -> done,
 * with failed reachable from every non-terminal state.
 */
import { BootstrapError, ErrorCodes } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export const MODULE_STATES = [
  'pending',
  'scaffolding',
  'manifesting',
  'packaging',
  'signed',
  'unsigned',
  'done',
  'failed',
] as const;

export type ModuleState = (typeof MODULE_STATES)[number];

const TRANSITIONS: Record<ModuleState, readonly ModuleState[]> = {
  pending: ['scaffolding', 'failed'],
  scaffolding: ['manifesting', 'failed'],
  manifesting: ['packaging', 'failed'],
  packaging: ['signed', 'unsigned', 'failed'],
  signed: ['done', 'failed'],
  unsigned: ['done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminal(state: ModuleState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: ModuleState, to: ModuleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class ModuleLifecycle {
  private current: ModuleState = 'pending';
  private readonly visited: ModuleState[] = ['pending'];

  constructor(
    readonly moduleName: string,
    private readonly log: Logger
  ) {}

  get state(): ModuleState {
    return this.current;
  }

  /** Every state entered so far, in order. */
  get history(): readonly ModuleState[] {
    return this.visited;
  }

  /**
   * @throws BootstrapError (ILLEGAL_TRANSITION) when `to` is not reachable from the current state
   */
  transition(to: ModuleState, reason?: string): void {
    if (!canTransition(this.current, to)) {
      throw new BootstrapError(
        ErrorCodes.ILLEGAL_TRANSITION,
        `Illegal transition for ${this.moduleName}: ${this.current} -> ${to}`,
        { module: this.moduleName, from: this.current, to }
      );
    }
    const message = `${this.moduleName}: ${this.current} -> ${to}${reason ? ` (${reason})` : ''}`;
    if (to === 'failed') {
      this.log.error(message);
    } else {
      this.log.info(message);
    }
    this.current = to;
    this.visited.push(to);
  }
}
