export type TurnState =
  | 'idle'
  | 'authorized'
  | 'history_loaded'
  | 'inferring'
  | 'committing'
  | 'done'
  | 'failed';

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  idle: ['authorized'],
  authorized: ['history_loaded'],
  history_loaded: ['inferring'],
  // A stream that closes without content finishes without committing.
  inferring: ['committing', 'done'],
  committing: ['done'],
  done: [],
  failed: [],
};

const TERMINAL: readonly TurnState[] = ['done', 'failed'];

/**
 * Lifecycle of a single chat turn. Any non-terminal state may fail; every
 * other move must follow TRANSITIONS.
 */
export class TurnStateMachine {
  private current: TurnState = 'idle';
  private readonly visited: TurnState[] = ['idle'];
  private failureReason: string | null = null;

  constructor(private readonly label: string) {}

  get state(): TurnState {
    return this.current;
  }

  get trail(): readonly TurnState[] {
    return this.visited;
  }

  get reason(): string | null {
    return this.failureReason;
  }

  advance(next: TurnState): void {
    if (next === 'failed' || !TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal turn transition ${this.current} -> ${next} (${this.label})`);
    }
    this.move(next);
  }

  fail(reason: string): void {
    if (TERMINAL.includes(this.current)) {
      throw new Error(`Turn already ${this.current}; cannot fail with ${reason} (${this.label})`);
    }
    this.failureReason = reason;
    this.move('failed');
  }

  private move(next: TurnState): void {
    this.current = next;
    this.visited.push(next);
    if (TERMINAL.includes(next)) {
      const suffix = this.failureReason ? ` (${this.failureReason})` : '';
      console.log(`[Turn] ${this.label}: ${this.visited.join(' -> ')}${suffix}`);
    }
  }
}
