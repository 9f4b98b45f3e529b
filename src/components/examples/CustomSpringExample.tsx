import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { customSpring } from "./motionVariants";
import { palette } from "./palette";
import { useTwoPoint } from "../../hooks/useTwoPoint";

// Low stiffness, low damping: a slow, visibly bouncy spring
export default function CustomSpringExample() {
  const [position, flip] = useTwoPoint(0, 200);

  return (
    <ExampleStage action={{ label: "Animate", onPress: flip }}>
      <motion.div
        data-testid="spring-circle"
        data-position={position}
        className="shape shape--circle"
        style={{ width: 50, height: 50, backgroundColor: palette.purple }}
        initial={false}
        animate={{ y: position }}
        transition={customSpring}
      />
    </ExampleStage>
  );
}
