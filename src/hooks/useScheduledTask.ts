import { useCallback, useEffect, useRef, useState } from "react";

export interface ScheduledTask {
  /** Run `fn` after `delayMs`. Replaces any task still pending. */
  schedule: (fn: () => void, delayMs: number) => void;
  cancel: () => void;
  isPending: boolean;
}

/**
 * One deferred callback owned by the calling component. Whatever is still
 * pending when the component unmounts is cancelled and never runs.
 */
export function useScheduledTask(): ScheduledTask {
  const timer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const [isPending, setPending] = useState(false);

  const clear = () => {
    if (timer.current !== null) {
      clearTimeout(timer.current);
      timer.current = null;
    }
  };

  const cancel = useCallback(() => {
    clear();
    setPending(false);
  }, []);

  const schedule = useCallback((fn: () => void, delayMs: number) => {
    clear();
    setPending(true);
    timer.current = setTimeout(() => {
      timer.current = null;
      setPending(false);
      fn();
    }, delayMs);
  }, []);

  useEffect(() => clear, []);

  return { schedule, cancel, isPending };
}
