/**
 * Transition tuple: [sourceState, event, targetState]
 *
 * - "" as sourceState marks the entry point
 * - "" as targetState marks the exit
 *
 * @example
 * ```ts
 * const transitions: FsmTransition[] = [
 *   ["", "START", "RUNNING"],
 *   ["RUNNING", "DEADLINE", "DRAINING"],
 *   ["DRAINING", "DRAINED", ""],
 * ];
 * ```
 */
export type FsmTransition = [sourceState: string, event: string, targetState: string];

/**
 * Handler for one state. Performs the state's work and returns the event
 * that selects the next transition.
 */
export type FsmStateHandler<C> = (context: C) => string | Promise<string>;
