import { Query, QueryState, QueryTransition } from '../config/types';
import { STATE_TRANSITIONS } from './types';
import { logger } from '../observability/logger';

export class StateMachine {
  /**
   * Attempt a state transition on a query record. Applies it and returns the
   * transition when allowed; otherwise leaves the record untouched and returns null.
   */
  transition(query: Query, targetState: QueryState, reason: string, at: number): QueryTransition | null {
    const currentState = query.state;
    if (!this.canTransition(currentState, targetState)) {
      logger.warn(
        { queryId: query.queryId, from: currentState, to: targetState, reason },
        'Invalid query transition attempted',
      );
      return null;
    }

    const event: QueryTransition = { from: currentState, to: targetState, reason, at };
    query.state = targetState;
    query.history.push(event);
    return event;
  }

  canTransition(from: QueryState, to: QueryState): boolean {
    return STATE_TRANSITIONS[from].includes(to);
  }
}

export const stateMachine = new StateMachine();
