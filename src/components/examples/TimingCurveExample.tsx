import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { timingCurve } from "./motionVariants";
import { palette } from "./palette";
import { useTwoPoint } from "../../hooks/useTwoPoint";

export default function TimingCurveExample() {
  const [offset, flip] = useTwoPoint(0, 200);

  return (
    <ExampleStage action={{ label: "Animate", onPress: flip }}>
      <motion.div
        data-testid="timing-rect"
        data-offset={offset}
        className="shape"
        style={{ width: 100, height: 50, backgroundColor: palette.orange }}
        initial={false}
        animate={{ x: offset }}
        transition={timingCurve}
      />
    </ExampleStage>
  );
}
