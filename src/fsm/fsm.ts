import type { FsmStateHandler, FsmTransition } from "./types.js";

/** Entry and exit state */
export const FSM_TERMINAL = "";

/**
 * State machine driven by event-returning handlers.
 *
 * The transition table is checked when the machine is built: every state
 * reachable through a transition needs a handler. `run` then steps from the
 * entry state until a transition leads back to the terminal state.
 *
 * @template C - Context passed to every handler
 */
export class Fsm<C> {
  private readonly table = new Map<string, Map<string, string>>();
  private current = FSM_TERMINAL;

  constructor(
    transitions: FsmTransition[],
    private readonly handlers: Map<string, FsmStateHandler<C>>,
  ) {
    for (const [source, event, target] of transitions) {
      const events = this.table.get(source) ?? new Map<string, string>();
      events.set(event, target);
      this.table.set(source, events);
    }

    for (const state of [FSM_TERMINAL, ...this.targets()]) {
      if (!this.handlers.has(state)) {
        throw new FsmError(`No handler for state: "${state}"`, state);
      }
    }
  }

  /** State whose handler runs next; terminal before and after a run */
  get state(): string {
    return this.current;
  }

  /**
   * Run from the entry state to the terminal state.
   *
   * @throws FsmError when a handler returns an event without a transition
   */
  async run(context: C): Promise<void> {
    this.current = FSM_TERMINAL;
    do {
      this.current = await this.step(context);
    } while (this.current !== FSM_TERMINAL);
  }

  private async step(context: C): Promise<string> {
    const state = this.current;
    const handler = this.handlers.get(state);
    if (!handler) {
      throw new FsmError(`No handler for state: "${state}"`, state);
    }
    const event = await handler(context);
    const target = this.table.get(state)?.get(event);
    if (target === undefined) {
      throw new FsmError(`No transition for event "${event}" from state "${state}"`, state, event);
    }
    return target;
  }

  private targets(): Set<string> {
    const states = new Set<string>();
    for (const events of this.table.values()) {
      for (const target of events.values()) {
        if (target !== FSM_TERMINAL) states.add(target);
      }
    }
    return states;
  }
}

/**
 * Raised on a missing handler or an event without a transition.
 */
export class FsmError extends Error {
  constructor(
    message: string,
    public readonly state: string,
    public readonly event?: string,
  ) {
    super(message);
    this.name = "FsmError";
  }
}
