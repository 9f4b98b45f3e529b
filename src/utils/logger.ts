/**
 * Structured UI logging with deterministic IDs.
 * - JSON-first events (console in dev, optional backend delivery)
 * - Deterministic ui_event_id derived from a stable hash of name + context
 * - Best-effort delivery via navigator.sendBeacon (falls back to fetch)
 */
import { peekRuntimeConfig } from "../config/runtime";

export type UIEventPayload = Record<string, unknown>;

export interface LogContext {
  /** Slug of the example screen currently on display, if any. */
  example?: string;
}

let __CONTEXT: LogContext = {};

export function setLogContext(ctx: LogContext): void {
  __CONTEXT = { ...__CONTEXT, ...ctx };
}

export function clearLogContext(): void {
  __CONTEXT = {};
}

export function currentLogContext(): LogContext {
  return { ...__CONTEXT };
}

/** Simple, deterministic FNV-1a hash to hex (stable across sessions). */
export function fnv1aHex(str: string): string {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h += (h << 1) + (h << 4) + (h << 7) + (h << 8) + (h << 24);
  }
  return (h >>> 0).toString(16).padStart(8, "0");
}

function salient(payload: UIEventPayload, key: string): unknown {
  const v = payload[key];
  return typeof v === "string" || typeof v === "number" ? v : null;
}

/** Build a deterministic id from event name + salient fields. */
function deterministicId(name: string, payload: UIEventPayload, ctx: LogContext): string {
  const key = JSON.stringify({
    name,
    example: ctx.example ?? null,
    route: salient(payload, "route"),
    action: salient(payload, "action"),
    slug: salient(payload, "slug"),
  });
  return `${fnv1aHex(name)}_${fnv1aHex(key)}`;
}

export interface UIEvent {
  ui_event_id: string;
  ts: string;
  level: "INFO" | "WARN" | "ERROR";
  service: "frontend";
  page: string;
  name: string;
  ctx: LogContext;
  payload: UIEventPayload;
}

export interface LogOptions {
  level?: UIEvent["level"];
}

function currentPage(): string {
  return typeof window !== "undefined" ? window.location.pathname : "";
}

function warnDeliveryFailed(err: unknown): void {
  // eslint-disable-next-line no-console
  console.warn("[ui.event] delivery failed", err instanceof Error ? err.message : String(err));
}

// never throw from logger: serialization, beacon and fetch failures are reported, not raised
function deliver(path: string, event: UIEvent): void {
  try {
    const body = JSON.stringify(event);
    const beacon =
      typeof navigator !== "undefined" && typeof navigator.sendBeacon === "function"
        ? navigator.sendBeacon(path, new Blob([body], { type: "application/json" }))
        : false;
    if (beacon) return;
    fetch(path, { method: "POST", headers: { "Content-Type": "application/json" }, body, keepalive: true })
      .catch(warnDeliveryFailed);
  } catch (err) {
    warnDeliveryFailed(err);
  }
}

/** Core logging function. Returns the event id. */
export function logEvent(name: string, payload: UIEventPayload = {}, opts: LogOptions = {}): string {
  const cfg = peekRuntimeConfig();
  const ctx = currentLogContext();
  const ui_event_id = deterministicId(name, payload, ctx);
  const event: UIEvent = {
    ui_event_id,
    ts: new Date().toISOString(),
    level: opts.level ?? "INFO",
    service: "frontend",
    page: currentPage(),
    name,
    ctx,
    payload,
  };

  if (cfg?.logging.console ?? true) {
    if (import.meta.env.PROD) {
      // eslint-disable-next-line no-console
      console.log("[ui.event]", { ui_event_id, name, ts: event.ts, ...ctx, payload });
    } else {
      // eslint-disable-next-line no-console
      console.log("[ui.event]", event);
    }
  }

  const endpoint = cfg?.logging.endpoint;
  if (endpoint) {
    deliver(endpoint, event);
  }

  return ui_event_id;
}
