import { motion } from "framer-motion";
import { Star } from "lucide-react";
import { ExampleStage } from "./ExampleStage";
import { dragFollow, dragRelease } from "./motionVariants";
import { palette } from "./palette";
import { useDragOffset } from "../../hooks/useDragOffset";

export default function DragExample() {
  const { offset, isDragging, onPanStart, onPan, onPanEnd } = useDragOffset();

  return (
    <ExampleStage caption="Drag me!">
      <motion.div
        data-testid="drag-star"
        data-offset-x={offset.x}
        data-offset-y={offset.y}
        data-dragging={isDragging}
        className="draggable"
        style={{ touchAction: "none" }}
        onPanStart={onPanStart}
        onPan={onPan}
        onPanEnd={onPanEnd}
        initial={false}
        animate={{ x: offset.x, y: offset.y }}
        transition={isDragging ? dragFollow : dragRelease}
      >
        <Star size={100} color={palette.star} fill={palette.star} aria-hidden="true" />
      </motion.div>
    </ExampleStage>
  );
}
