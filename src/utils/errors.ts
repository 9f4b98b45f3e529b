import { ZodError } from "zod";

/**
 * Collapse anything that was thrown into one readable line for the UI.
 */
export function normalizeErrorMessage(raw: unknown): string {
  if (raw instanceof ZodError) {
    const issues = raw.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return `Invalid value — ${issues.join("; ")}`;
  }

  if (raw instanceof Error) {
    if (isChunkLoadFailure(raw.message)) {
      return "Example failed to load. Check your connection and reload.";
    }
    const name = raw.name && raw.name !== "Error" ? raw.name : "";
    if (name && raw.message) return `${name}: ${raw.message}`;
    return raw.message || name || "Unknown error";
  }

  if (raw && typeof raw === "object" && "message" in raw && typeof raw.message === "string") {
    return raw.message;
  }

  const s = String(raw ?? "").trim();
  if (isChunkLoadFailure(s)) return "Example failed to load. Check your connection and reload.";
  return s || "Unknown error";
}

// Vite/Rollup, webpack and Safari phrase a failed dynamic import differently
const CHUNK_FAILURE_PATTERNS = [
  /failed to fetch dynamically imported module/i,
  /error loading dynamically imported module/i,
  /importing a module script failed/i,
  /loading chunk [\w-]+ failed/i,
];

export function isChunkLoadFailure(message: string): boolean {
  return CHUNK_FAILURE_PATTERNS.some((re) => re.test(message));
}
