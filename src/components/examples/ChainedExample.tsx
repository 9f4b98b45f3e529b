import { motion } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { CHAIN_STEP_MS, chainStep } from "./motionVariants";
import { palette } from "./palette";
import { useChainedSequence } from "../../hooks/useChainedSequence";

export interface ChainState {
  scale: number;
  color: "red" | "blue";
}

export const CHAIN_INITIAL: ChainState = { scale: 1, color: "red" };
const GROW: Partial<ChainState> = { scale: 1.5 };
const SETTLE: Partial<ChainState> = { scale: 1, color: "blue" };

const DIAMETER = 100;

/**
 * Grow, then one step later shrink back and turn blue. The second step is
 * owned by the screen: leaving it cancels the pending step, pressing again
 * restarts the chain.
 */
export default function ChainedExample() {
  const { state, run, isRunning } = useChainedSequence(CHAIN_INITIAL, GROW, SETTLE, CHAIN_STEP_MS);
  const size = DIAMETER * state.scale;

  return (
    <ExampleStage action={{ label: "Animate Chain", onPress: run }}>
      <motion.div
        data-testid="chained-circle"
        data-scale={state.scale}
        data-color={state.color}
        data-running={isRunning}
        className="shape shape--circle"
        initial={false}
        animate={{ width: size, height: size, backgroundColor: palette[state.color] }}
        transition={chainStep}
      />
    </ExampleStage>
  );
}
