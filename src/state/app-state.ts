/**
 * Processing State Management
 * Observable container for the pipeline's processing state
 */

import { STATE_LABELS, type ProcessingState } from '../../shared/types';

export type StateChangeCallback = (state: ProcessingState, previousState: ProcessingState) => void;

export class ProcessingStateManager {
  private state: ProcessingState = 'idle';
  private listeners: StateChangeCallback[] = [];

  /** Get current state */
  getState(): ProcessingState {
    return this.state;
  }

  /** Transition to a new state */
  setState(newState: ProcessingState): void {
    if (this.state === newState) return;

    const previousState = this.state;
    this.state = newState;

    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(newState, previousState);
      } catch (err) {
        console.error('Error in state listener:', err);
      }
    }
  }

  /** Subscribe to state changes */
  subscribe(callback: StateChangeCallback): () => void {
    this.listeners.push(callback);

    // Return unsubscribe function
    return () => {
      const index = this.listeners.indexOf(callback);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /** Check if in a specific state */
  is(state: ProcessingState): boolean {
    return this.state === state;
  }

  /** Only idle accepts a new run */
  isIdle(): boolean {
    return this.state === 'idle';
  }

  /** Check if the stop control should be offered */
  isBusy(): boolean {
    return this.state !== 'idle';
  }

  getLabel(): string {
    return STATE_LABELS[this.state];
  }
}

/** State transition labels for display */
export { STATE_LABELS };
export type { ProcessingState };
