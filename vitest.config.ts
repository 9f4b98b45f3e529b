import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

// Reuses the Vite React plugin and renders into jsdom so React Testing
// Library can drive the screens. The setup file registers jest-dom matchers,
// makes framer-motion finish animations immediately and loads a quiet config.
export default defineConfig({
  plugins: [react()],
  test: {
    environment: "jsdom",
    globals: true,
    setupFiles: "src/tests/setup.ts",
    include: ["src/**/*.test.{ts,tsx}"],
  },
});
