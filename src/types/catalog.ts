import type { ComponentType } from "react";

/** A 2D translation in CSS pixels. */
export interface Offset2D {
  x: number;
  y: number;
}

export interface Axis3D {
  x: number;
  y: number;
  z: number;
}

/** Module shape every example screen file exports. */
export interface ExampleModule {
  default: ComponentType;
}

export interface CatalogEntry {
  /** URL segment under /examples/ */
  slug: string;
  /** Row label and screen heading */
  label: string;
  /** One-line description shown under the heading */
  summary: string;
  load: () => Promise<ExampleModule>;
}
