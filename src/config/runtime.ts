import { CatalogConfig, CatalogConfigFromEnv } from "./schema";

declare global {
  interface Window { __CATALOG_CONFIG?: CatalogConfig }
}

export type EnvSource = Record<string, string | boolean | undefined>;

/** Validate the VITE_CATALOG_* variables and cache the result on window.__CATALOG_CONFIG. */
export function loadRuntimeConfig(env: EnvSource = import.meta.env): CatalogConfig {
  // Only our own keys; Vite also injects MODE, DEV, BASE_URL etc.
  const picked: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(env)) {
    if (!key.startsWith("VITE_CATALOG_")) continue;
    // blank values count as unset
    const value = typeof raw === "string" ? raw.trim() : raw;
    if (value !== "" && value !== undefined) {
      picked[key] = value;
    }
  }
  const parsed = CatalogConfigFromEnv.safeParse(picked);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Config bootstrap failed: invalid ${keys}`);
  }
  window.__CATALOG_CONFIG = parsed.data;
  return parsed.data;
}

/** Read the current runtime config after loadRuntimeConfig() has been called. */
export function getRuntimeConfig(): CatalogConfig {
  const cfg = window.__CATALOG_CONFIG;
  if (!cfg) throw new Error("Runtime config not initialized – call loadRuntimeConfig() in main.tsx first.");
  return cfg;
}

/** Same as getRuntimeConfig() but tolerates an uninitialized config (logger, early errors). */
export function peekRuntimeConfig(): CatalogConfig | undefined {
  return typeof window !== "undefined" ? window.__CATALOG_CONFIG : undefined;
}

export function resetRuntimeConfig(): void {
  delete window.__CATALOG_CONFIG;
}
