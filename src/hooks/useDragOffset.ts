import { useCallback, useState } from "react";
import type { PanInfo } from "framer-motion";
import type { Offset2D } from "../types/catalog";
import { ZERO_OFFSET } from "../utils/motion";

type PanHandler = (event: PointerEvent | MouseEvent | TouchEvent, info: PanInfo) => void;

export interface DragOffset {
  offset: Offset2D;
  isDragging: boolean;
  onPanStart: PanHandler;
  onPan: PanHandler;
  onPanEnd: PanHandler;
}

/**
 * Tracks a pan gesture: the offset mirrors the gesture's cumulative
 * translation while it lasts and snaps back to zero once it ends.
 */
export function useDragOffset(): DragOffset {
  const [offset, setOffset] = useState<Offset2D>(ZERO_OFFSET);
  const [isDragging, setDragging] = useState(false);

  const onPanStart = useCallback<PanHandler>(() => setDragging(true), []);
  const onPan = useCallback<PanHandler>((_event, info) => {
    setOffset({ x: info.offset.x, y: info.offset.y });
  }, []);
  const onPanEnd = useCallback<PanHandler>(() => {
    setDragging(false);
    setOffset(ZERO_OFFSET);
  }, []);

  return { offset, isDragging, onPanStart, onPan, onPanEnd };
}
