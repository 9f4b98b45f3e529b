import { z } from "zod";

/** framer-motion's MotionConfig `reducedMotion` modes */
export const ReducedMotion = z.enum(["user", "always", "never"]);
export type ReducedMotion = z.infer<typeof ReducedMotion>;

/** Absolute http(s) URL or a same-origin path such as `/ui/logs` */
export const LogEndpoint = z
  .string()
  .trim()
  .refine((v) => /^\/(?!\/)\S*$/.test(v) || isHttpUrl(v), { message: "expected an http(s) URL or a path starting with /" });

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

// Raw Vite env vars: everything arrives as a string (or not at all)
export const CatalogEnv = z.object({
  VITE_CATALOG_TITLE: z.string().trim().min(1).optional(),
  VITE_CATALOG_REDUCED_MOTION: ReducedMotion.optional(),
  VITE_CATALOG_LOG_CONSOLE: z.enum(["0", "1"]).optional(),
  VITE_CATALOG_LOG_ENDPOINT: LogEndpoint.optional(),
});
export type CatalogEnv = z.infer<typeof CatalogEnv>;

export const CatalogConfig = z.object({
  title: z.string().min(1),
  reduced_motion: ReducedMotion,
  logging: z.object({
    console: z.boolean(),
    endpoint: z.string().min(1).optional(),
  }),
});
export type CatalogConfig = z.infer<typeof CatalogConfig>;

export const DEFAULT_TITLE = "Improved Animation Catalog";

export const CatalogConfigFromEnv = CatalogEnv.transform(
  (env): CatalogConfig => ({
    title: env.VITE_CATALOG_TITLE ?? DEFAULT_TITLE,
    reduced_motion: env.VITE_CATALOG_REDUCED_MOTION ?? "user",
    logging: {
      console: (env.VITE_CATALOG_LOG_CONSOLE ?? "1") === "1",
      endpoint: env.VITE_CATALOG_LOG_ENDPOINT,
    },
  }),
);
