// src/components/examples/motionVariants.ts
import type { Transition, Variants } from "framer-motion";

// Default "ease in out" feel used by the state-driven examples
export const easeInOut = {
  duration: 0.35,
  ease: "easeInOut",
} satisfies Transition;

export const customSpring: Transition = {
  type: "spring",
  stiffness: 50,
  damping: 5,
};

// Standard CSS "ease" control points, stretched over two seconds
export const timingCurve: Transition = {
  duration: 2,
  ease: [0.25, 0.1, 0.25, 1],
};

export const repeatWithDelay: Transition = {
  duration: 1,
  ease: "easeInOut",
  repeat: Infinity,
  repeatType: "reverse",
  delay: 0.5,
};

export const CHAIN_STEP_MS = 1000;

export const chainStep: Transition = {
  duration: CHAIN_STEP_MS / 1000,
  ease: "easeInOut",
};

export const progressFill = {
  duration: 3,
  ease: "linear",
} satisfies Transition;

export const dragRelease: Transition = {
  duration: 0.35,
  ease: "easeOut",
};

// While the finger is down the shape tracks it 1:1
export const dragFollow: Transition = { duration: 0 };

// Frame morph springs, colour cross-fades
export const sharedLayoutMorph: Transition = {
  layout: { type: "spring", stiffness: 300, damping: 30 },
  backgroundColor: { duration: 0.35, ease: "easeInOut" },
};

// Slide in from the leading edge, out through the trailing edge, fading both ways
export const slideFadeVariants: Variants = {
  hidden: { x: "-100%", opacity: 0 },
  show: {
    x: 0,
    opacity: 1,
    transition: easeInOut,
  },
  exit: {
    x: "100%",
    opacity: 0,
    transition: easeInOut,
  },
};

export const catalogListVariants: Variants = {
  hidden: {},
  show: {
    transition: { staggerChildren: 0.04 },
  },
};

export const catalogRowVariants: Variants = {
  hidden: { opacity: 0, y: 8 },
  show: {
    opacity: 1,
    y: 0,
    transition: { duration: 0.3, ease: "easeOut" },
  },
};

export const screenVariants: Variants = {
  hidden: { opacity: 0, y: 12 },
  show: {
    opacity: 1,
    y: 0,
    transition: { duration: 0.4, ease: "easeOut" },
  },
};
