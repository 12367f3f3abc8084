export type RequestState = 'Idle' | 'Dispatched' | 'Decoded' | 'Delivered';

export type RequestTransitionListener = (
  requestId: number,
  from: RequestState,
  to: RequestState,
) => void;

export type ListenerErrorHandler = (error: unknown) => void;

const NEXT_STATE: Record<RequestState, RequestState | undefined> = {
  Idle: 'Dispatched',
  Dispatched: 'Decoded',
  Decoded: 'Delivered',
  Delivered: undefined,
};

/**
 * Tracks one request from dispatch to delivery. The machine only moves
 * forward, so a request that reached `Delivered` can never be delivered again.
 *
 * The listener runs after the state has changed. When an `onListenerError`
 * handler is given, a throwing listener is reported there and the transition
 * still completes; without one the error propagates to the caller.
 */
export class RequestLifecycle {
  readonly id: number;

  private current: RequestState = 'Idle';

  private readonly listener?: RequestTransitionListener;

  private readonly onListenerError?: ListenerErrorHandler;

  constructor(
    id: number,
    listener?: RequestTransitionListener,
    onListenerError?: ListenerErrorHandler,
  ) {
    this.id = id;
    this.listener = listener;
    this.onListenerError = onListenerError;
  }

  get state(): RequestState {
    return this.current;
  }

  get delivered(): boolean {
    return this.current === 'Delivered';
  }

  advance(to: RequestState): void {
    const from = this.current;

    if (NEXT_STATE[from] !== to) {
      throw new Error(`Request ${this.id} cannot move from ${from} to ${to}`);
    }

    this.current = to;

    if (!this.listener) {
      return;
    }

    if (!this.onListenerError) {
      this.listener(this.id, from, to);
      return;
    }

    try {
      this.listener(this.id, from, to);
    } catch (error) {
      this.onListenerError(error);
    }
  }
}
