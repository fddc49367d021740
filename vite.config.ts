import { defineConfig } from "vite";

export default defineConfig({
  // Served from a sub-path on static hosting, so asset paths need this prefix
  base: "/gl-link-graph/",
  server: {
    open: true,          // Auto-open browser on `vite dev`
    port: 5199,          // Fixed dev server port
    strictPort: true,    // Fail if port 5199 is already in use (don't silently pick another)
  },
});
