import { defineConfig } from "vite";

export default defineConfig({
  build: {
    // tsc writes the library build to dist/
    outDir: "dist/web",
  },
});
