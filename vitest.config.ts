import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to their sources so tests need no build
export default defineConfig({
  resolve: {
    alias: {
      "pdb-structure": fileURLToPath(new URL("./pdb-structure/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["pdb-structure/tests/**/*.spec.ts", "pdb-windows/tests/**/*.spec.ts"],
    environment: "node",
  },
});
