// System-style accent colours shared by the example screens
export const palette = {
  red: "#ff3b30",
  blue: "#007aff",
  green: "#34c759",
  purple: "#af52de",
  orange: "#ff9500",
  pink: "#ff2d55",
  gray: "#8e8e93",
  star: "#ffcc00",
} as const;
