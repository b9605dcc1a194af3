import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    environment: "node",
    include: ["back/src/**/*.test.ts", "front/src/**/*.test.{ts,tsx}"],
    setupFiles: ["./front/src/test/setup.ts"],
    restoreMocks: true,
  },
});
