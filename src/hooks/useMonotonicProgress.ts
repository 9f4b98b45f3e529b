import { useCallback, useState } from "react";
import { clampUnit } from "../utils/motion";

export interface MonotonicProgress {
  progress: number;
  advanceTo: (target: number) => void;
}

/** Progress in [0, 1] that only ever moves forward. */
export function useMonotonicProgress(initial = 0): MonotonicProgress {
  const [progress, setProgress] = useState(() => clampUnit(initial));

  const advanceTo = useCallback((target: number) => {
    if (!Number.isFinite(target)) return;
    setProgress((p) => Math.max(p, clampUnit(target)));
  }, []);

  return { progress, advanceTo };
}
