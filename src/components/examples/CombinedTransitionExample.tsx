import { AnimatePresence, motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { slideFadeVariants } from "./motionVariants";
import { palette } from "./palette";
import { useToggle } from "../../hooks/useToggle";

export default function CombinedTransitionExample() {
  const [isVisible, toggle] = useToggle(false);

  return (
    <ExampleStage action={{ label: "Toggle", onPress: toggle }}>
      <AnimatePresence initial={false}>
        {isVisible && (
          <motion.div
            key="greeting"
            data-testid="combined-badge"
            className="badge"
            style={{ backgroundColor: palette.green, borderRadius: 10 }}
            variants={slideFadeVariants}
            initial="hidden"
            animate="show"
            exit="exit"
          >
            Hello, World!
          </motion.div>
        )}
      </AnimatePresence>
    </ExampleStage>
  );
}
