import { useCallback, useState } from "react";
import { toggleBetween } from "../utils/motion";

/** A value that only ever sits on one of two endpoints; starts on `a`. */
export function useTwoPoint<T>(a: T, b: T): [T, () => void] {
  const [value, setValue] = useState<T>(a);
  const flip = useCallback(() => setValue((v) => toggleBetween(v, a, b)), [a, b]);
  return [value, flip];
}
