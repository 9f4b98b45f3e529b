import { LayoutGroup, motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { sharedLayoutMorph } from "./motionVariants";
import { palette } from "./palette";
import { useToggle } from "../../hooks/useToggle";

/**
 * The frame changes through plain layout (width/height); `layoutId` makes
 * framer-motion measure both boxes and morph between them.
 */
export default function SharedLayoutExample() {
  const [isExpanded, toggle] = useToggle(false);
  const size = isExpanded ? 300 : 100;

  return (
    <ExampleStage action={{ label: "Toggle Size", onPress: toggle }}>
      <LayoutGroup id="shared-layout">
        <motion.div
          layoutId="shared-rect"
          data-testid="shared-rect"
          data-expanded={isExpanded}
          className="shape"
          style={{ width: size, height: size, borderRadius: 20 }}
          initial={false}
          animate={{ backgroundColor: isExpanded ? palette.blue : palette.red }}
          transition={sharedLayoutMorph}
        />
      </LayoutGroup>
    </ExampleStage>
  );
}
