import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { easeInOut } from "./motionVariants";
import { palette } from "./palette";
import { useToggle } from "../../hooks/useToggle";

/** Colour and size follow one boolean; the tween comes from `animate`. */
export default function BasicStateExample() {
  const [isActive, toggle] = useToggle(false);
  const size = isActive ? 100 : 50;

  return (
    <ExampleStage action={{ label: "Toggle State", onPress: toggle }}>
      <motion.div
        data-testid="basic-circle"
        data-active={isActive}
        className="shape shape--circle"
        initial={false}
        animate={{
          width: size,
          height: size,
          backgroundColor: isActive ? palette.blue : palette.red,
        }}
        transition={easeInOut}
      />
    </ExampleStage>
  );
}
