import { useCallback, useState } from "react";

/**
 * Boolean state with a stable toggle. The functional update keeps one call
 * to one flip, even when StrictMode double-invokes render.
 */
export function useToggle(initial = false): [boolean, () => void, (next: boolean) => void] {
  const [value, setValue] = useState(initial);
  const toggle = useCallback(() => setValue((v) => !v), []);
  return [value, toggle, setValue];
}
