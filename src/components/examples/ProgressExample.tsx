import { useEffect, useState } from "react";
import { animate, motion, useMotionValue, useMotionValueEvent, useTransform } from "framer-motion";
import { ExampleStage } from "./ExampleStage";
import { progressFill } from "./motionVariants";
import { palette } from "./palette";
import { useMonotonicProgress } from "../../hooks/useMonotonicProgress";
import { clampUnit } from "../../utils/motion";

const DIAMETER = 220;
const STROKE = 20;
const BOX = DIAMETER + STROKE;
const CENTER = BOX / 2;
const RADIUS = DIAMETER / 2;

function toPercent(v: number): number {
  return Math.round(clampUnit(v) * 100);
}

export default function ProgressExample() {
  const { progress, advanceTo } = useMonotonicProgress(0);
  const fill = useMotionValue(0);
  const label = useTransform(fill, (v) => `${toPercent(v)}%`);
  // what the ring currently shows, not the target it is heading for
  const [shown, setShown] = useState(0);
  useMotionValueEvent(fill, "change", (v) => setShown(toPercent(v)));

  useEffect(() => {
    const controls = animate(fill, progress, progressFill);
    return () => controls.stop();
  }, [fill, progress]);

  return (
    <ExampleStage action={{ label: "Animate Progress", onPress: () => advanceTo(1) }}>
      <div className="progress-ring">
        <svg
          role="progressbar"
          aria-valuemin={0}
          aria-valuemax={100}
          aria-valuenow={shown}
          data-progress={progress}
          width={BOX}
          height={BOX}
          viewBox={`0 0 ${BOX} ${BOX}`}
        >
          <circle
            cx={CENTER}
            cy={CENTER}
            r={RADIUS}
            fill="none"
            stroke={palette.gray}
            strokeOpacity={0.3}
            strokeWidth={STROKE}
          />
          {/* start the trim at 12 o'clock */}
          <g transform={`rotate(-90 ${CENTER} ${CENTER})`}>
            <motion.circle
              cx={CENTER}
              cy={CENTER}
              r={RADIUS}
              fill="none"
              stroke={palette.blue}
              strokeWidth={STROKE}
              style={{ pathLength: fill }}
            />
          </g>
        </svg>
        <motion.span className="progress-ring__label">{label}</motion.span>
      </div>
    </ExampleStage>
  );
}
