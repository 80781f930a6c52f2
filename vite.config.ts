import { defineConfig, loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), "");
  const apiProxyTarget = env.VITE_API_PROXY_TARGET || "http://localhost:8000";
  return {
    server: {
      port: 5174,
      strictPort: true,
      proxy: {
        // Dev proxy so the estimate form can post to the local API server
        "/api": {
          target: apiProxyTarget,
          changeOrigin: true,
        },
      },
    },
    build: {
      sourcemap: true,
      rollupOptions: {
        output: {
          manualChunks: {
            maplibre: ["maplibre-gl"],
          },
        },
      },
    },
    envPrefix: ["VITE_"],
  };
});
