import { Suspense, useEffect } from "react";
import { Link, useParams } from "react-router-dom";
import { motion } from "framer-motion";
import { ChevronLeft } from "lucide-react";
import Card from "../components/ui/Card";
import RouteLoader from "../components/common/RouteLoader";
import { ErrorBoundary } from "../components/common/ErrorBoundary";
import { screenVariants } from "../components/examples/motionVariants";
import { findEntry } from "../catalog/registry";
import { lazyRoute } from "./lazyRoute";
import { clearLogContext, logEvent, setLogContext } from "../utils/logger";

function BackLink() {
  return (
    <Link to="/" className="back-link">
      <ChevronLeft size={18} aria-hidden="true" />
      <span>Catalog</span>
    </Link>
  );
}

export default function ExampleRoute() {
  const { slug } = useParams<{ slug: string }>();
  const entry = findEntry(slug);

  useEffect(() => {
    if (!entry) {
      logEvent("ui.example_not_found", { slug: slug ?? "" }, { level: "WARN" });
      return;
    }
    setLogContext({ example: entry.slug });
    logEvent("ui.example_open", { slug: entry.slug });
    return () => clearLogContext();
  }, [entry, slug]);

  if (!entry) {
    return (
      <section className="screen">
        <BackLink />
        <p className="screen__missing">Example not found.</p>
      </section>
    );
  }

  const Screen = lazyRoute(`example.${entry.slug}`, entry.load);

  return (
    <motion.section
      key={entry.slug}
      className="screen"
      variants={screenVariants}
      initial="hidden"
      animate="show"
    >
      <header className="screen__header">
        <BackLink />
        <h1 className="screen__title">{entry.label}</h1>
        <p className="screen__summary">{entry.summary}</p>
      </header>
      <Card className="screen__stage">
        <ErrorBoundary resetKey={entry.slug}>
          <Suspense fallback={<RouteLoader />}>
            <Screen />
          </Suspense>
        </ErrorBoundary>
      </Card>
    </motion.section>
  );
}
