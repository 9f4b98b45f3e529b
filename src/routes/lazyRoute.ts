import { lazy, type ComponentType, type LazyExoticComponent } from "react";
import { logEvent } from "../utils/logger";
import { normalizeErrorMessage } from "../utils/errors";

type Loader = () => Promise<{ default: ComponentType }>;

const cache = new Map<string, LazyExoticComponent<ComponentType>>();

/**
 * React.lazy with chunk telemetry. Memoized per route name so re-renders
 * never swap the component type (which would remount the screen).
 */
export function lazyRoute(route: string, loader: Loader): LazyExoticComponent<ComponentType> {
  const cached = cache.get(route);
  if (cached) return cached;

  const component = lazy(() => {
    logEvent("ui.route_chunk_fetch", { route });
    return loader()
      .then((m) => {
        logEvent("ui.route_chunk_ready", { route });
        return { default: m.default };
      })
      .catch((err: unknown) => {
        logEvent("ui.route_chunk_error", { route, error: normalizeErrorMessage(err) }, { level: "ERROR" });
        // a failed chunk must be retryable after the user navigates away and back
        cache.delete(route);
        throw err;
      });
  });
  cache.set(route, component);
  return component;
}
