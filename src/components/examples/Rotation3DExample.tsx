import { useEffect, useState } from "react";
import { animate, motion, useMotionValue, useTransform } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { easeInOut } from "./motionVariants";
import { palette } from "./palette";
import { rotate3d } from "../../utils/motion";
import type { Axis3D } from "../../types/catalog";

const AXIS: Axis3D = { x: 1, y: 1, z: 0 };

// framer-motion only animates rotateX/Y/Z separately; an arbitrary axis goes through rotate3d()
export default function Rotation3DExample() {
  const [angle, setAngle] = useState(0);
  const animated = useMotionValue(0);
  const transform = useTransform(animated, (deg) => rotate3d(AXIS, deg));

  useEffect(() => {
    const controls = animate(animated, angle, easeInOut);
    return () => controls.stop();
  }, [animated, angle]);

  return (
    <ExampleStage action={{ label: "Rotate 3D", onPress: () => setAngle((a) => a + 45) }}>
      <div className="perspective">
        <motion.div
          data-testid="rotation-3d-square"
          data-angle={angle}
          className="shape"
          style={{ width: 100, height: 100, backgroundColor: palette.pink, transform }}
        />
      </div>
    </ExampleStage>
  );
}
