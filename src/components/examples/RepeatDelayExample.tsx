import { useState } from "react";
import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { repeatWithDelay } from "./motionVariants";
import { palette } from "./palette";

export default function RepeatDelayExample() {
  const [rotation, setRotation] = useState(0);

  return (
    <ExampleStage action={{ label: "Start Animation", onPress: () => setRotation((r) => r + 360) }}>
      <motion.div
        data-testid="repeat-rect"
        data-rotation={rotation}
        className="shape"
        style={{ width: 100, height: 50, backgroundColor: palette.green }}
        initial={false}
        animate={{ rotate: rotation }}
        transition={repeatWithDelay}
      />
    </ExampleStage>
  );
}
