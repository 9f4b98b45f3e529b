import { useState } from "react";
import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { easeInOut } from "./motionVariants";
import { palette } from "./palette";
import { useTwoPoint } from "../../hooks/useTwoPoint";

const ANGLE_STEP = 45;

/** Rotation accumulates; scale flips between 1 and 1.5. */
export default function ModifierExample() {
  const [angle, setAngle] = useState(0);
  const [scale, flipScale] = useTwoPoint(1, 1.5);

  const rotateAndScale = () => {
    setAngle((a) => a + ANGLE_STEP);
    flipScale();
  };

  return (
    <ExampleStage action={{ label: "Rotate and Scale", onPress: rotateAndScale }}>
      <motion.div
        data-testid="modifier-square"
        data-angle={angle}
        data-scale={scale}
        className="shape"
        style={{ width: 100, height: 100, backgroundColor: palette.blue }}
        initial={false}
        animate={{ rotate: angle, scale }}
        transition={easeInOut}
      />
    </ExampleStage>
  );
}
