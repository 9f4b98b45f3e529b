import type { CatalogEntry } from "../types/catalog";

/**
 * The catalog, in display order. Screens are split into their own chunks and
 * only fetched when opened.
 */
export const catalogEntries: readonly CatalogEntry[] = [
  {
    slug: "basic-state",
    label: "Basic: State Change",
    summary: "Colour and size follow a boolean, eased in and out.",
    load: () => import("../components/examples/BasicStateExample"),
  },
  {
    slug: "combined-transition",
    label: "Transition: Combined (Slide + Opacity)",
    summary: "Insertion slides in and fades in; removal slides out and fades out.",
    load: () => import("../components/examples/CombinedTransitionExample"),
  },
  {
    slug: "custom-spring",
    label: "Spring: Custom Spring",
    summary: "A soft spring (stiffness 50, damping 5) moves the circle down and back.",
    load: () => import("../components/examples/CustomSpringExample"),
  },
  {
    slug: "timing-curve",
    label: "Timing Curve: EaseInOut",
    summary: "Cubic-bezier(0.25, 0.1, 0.25, 1) over two seconds.",
    load: () => import("../components/examples/TimingCurveExample"),
  },
  {
    slug: "rotation-scale",
    label: "Modifier: Rotation and Scale",
    summary: "Each press adds 45° of rotation and flips the scale.",
    load: () => import("../components/examples/ModifierExample"),
  },
  {
    slug: "repeat-delay",
    label: "Repeat and Delay",
    summary: "Half a second of delay, then a full turn that reverses forever.",
    load: () => import("../components/examples/RepeatDelayExample"),
  },
  {
    slug: "chained",
    label: "Chained Animation",
    summary: "Grow, then one second later shrink back and turn blue.",
    load: () => import("../components/examples/ChainedExample"),
  },
  {
    slug: "rotation-3d",
    label: "3D Animation",
    summary: "Rotation about the (1, 1, 0) axis under perspective.",
    load: () => import("../components/examples/Rotation3DExample"),
  },
  {
    slug: "shared-layout",
    label: "Shared Layout: Geometry Morph",
    summary: "One shape morphs its frame and colour between two layouts.",
    load: () => import("../components/examples/SharedLayoutExample"),
  },
  {
    slug: "progress",
    label: "Animate Progress",
    summary: "A ring trims from empty to full over three seconds.",
    load: () => import("../components/examples/ProgressExample"),
  },
  {
    slug: "drag-parallax",
    label: "Drag: Parallax Offset",
    summary: "The star follows your finger and eases home on release.",
    load: () => import("../components/examples/DragExample"),
  },
];

const bySlug = new Map(catalogEntries.map((e) => [e.slug, e]));

export function findEntry(slug: string | undefined): CatalogEntry | undefined {
  return slug ? bySlug.get(slug) : undefined;
}

export function examplePath(slug: string): string {
  return `/examples/${encodeURIComponent(slug)}`;
}
