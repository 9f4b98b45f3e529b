import CatalogList from "../components/catalog/CatalogList";
import { getRuntimeConfig } from "../config/runtime";

/**
 * Landing route: the list of examples under the configured title.
 */
export default function CatalogRoute() {
  const { title } = getRuntimeConfig();
  return <CatalogList title={title} />;
}
