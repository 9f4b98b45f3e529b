// src/components/common/RouteLoader.tsx
import { useEffect } from "react";
import { logEvent } from "../../utils/logger";

export default function RouteLoader() {
  useEffect(() => {
    logEvent("ui.route_loading_fallback", {
      route: typeof window !== "undefined" ? window.location?.pathname : undefined,
    });
  }, []);

  return (
    <div className="route-loader" role="status">
      Loading…
    </div>
  );
}
