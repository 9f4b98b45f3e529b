// src/App.tsx
import { BrowserRouter as Router, Routes, Route, useLocation } from "react-router-dom";
import { Suspense } from "react";
import { MotionConfig } from "framer-motion";
import { getRuntimeConfig } from "./config/runtime";
import { lazyRoute } from "./routes/lazyRoute";
import RouteLoader from "./components/common/RouteLoader";
import { ErrorBoundary } from "./components/common/ErrorBoundary";

const CatalogRoute = lazyRoute("catalog", () => import("./routes/CatalogRoute"));
const ExampleRoute = lazyRoute("example", () => import("./routes/ExampleRoute"));

/** Route table; App supplies the router so tests can use a MemoryRouter instead. */
export function AppRoutes() {
  const { pathname } = useLocation();

  // A failed route chunk lands here instead of unmounting the root
  return (
    <ErrorBoundary resetKey={pathname}>
      <Suspense fallback={<RouteLoader />}>
        <Routes>
          <Route path="/" element={<CatalogRoute />} />
          <Route path="/examples/:slug" element={<ExampleRoute />} />
          <Route path="*" element={<p className="screen__missing">Page not found.</p>} />
        </Routes>
      </Suspense>
    </ErrorBoundary>
  );
}

export default function App() {
  const { reduced_motion } = getRuntimeConfig();

  return (
    <MotionConfig reducedMotion={reduced_motion}>
      <div className="app-shell">
        <Router basename={import.meta.env.BASE_URL}>
          <AppRoutes />
        </Router>
      </div>
    </MotionConfig>
  );
}
