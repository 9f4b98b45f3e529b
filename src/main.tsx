import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import "./styles/catalog.css";
import { loadRuntimeConfig } from "./config/runtime";
import { normalizeErrorMessage } from "./utils/errors";

// Bootstrap: validate runtime config before mounting the app.
function bootstrap() {
  const rootElement = document.getElementById("root");
  if (!rootElement) {
    throw new Error("Missing root element in index.html");
  }
  loadRuntimeConfig();
  createRoot(rootElement).render(
    <StrictMode>
      <App />
    </StrictMode>
  );
}

try {
  bootstrap();
} catch (err) {
  // Fail closed with the reason on screen
  const pre = document.createElement("pre");
  pre.className = "bootstrap-error";
  pre.textContent = normalizeErrorMessage(err);
  document.body.replaceChildren(pre);
}
