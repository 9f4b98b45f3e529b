import { useCallback, useState } from "react";
import { useScheduledTask } from "./useScheduledTask";

export interface ChainedSequence<S> {
  state: S;
  /** Apply the first stage now and schedule the second; restarts a running chain. */
  run: () => void;
  /** True while the second stage is waiting on its delay. */
  isRunning: boolean;
}

/**
 * Two-step chain: `first` is applied synchronously, `second` after `delayMs`.
 * Both stages are patches over the current state.
 */
export function useChainedSequence<S extends object>(
  initial: S,
  first: Partial<S>,
  second: Partial<S>,
  delayMs: number,
): ChainedSequence<S> {
  const [state, setState] = useState<S>(initial);
  const task = useScheduledTask();
  const { schedule } = task;

  const run = useCallback(() => {
    setState((s) => ({ ...s, ...first }));
    schedule(() => setState((s) => ({ ...s, ...second })), delayMs);
  }, [first, second, delayMs, schedule]);

  return { state, run, isRunning: task.isPending };
}
