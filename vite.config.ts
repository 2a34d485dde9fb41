import preact from "@preact/preset-vite";
import { defineConfig, loadEnv } from "vite";
import { ENV_PREFIX, loadBoardConfig } from "./src/config.ts";
import { boardApi } from "./src/server/plugin.ts";

export const PORT = 7860;

export default defineConfig(({ mode }) => {
  // Board credentials stay on the server: VESTABOARD_* is not an envPrefix,
  // so none of it is exposed to browser code.
  const env = loadEnv(mode, process.cwd(), ENV_PREFIX);
  return {
    build: {
      outDir: "dist",
      rollupOptions: {
        input: {
          main: "./index.html",
        },
      },
      sourcemap: true,
    },
    plugins: [preact(), boardApi({ config: loadBoardConfig(env) })],
    preview: {
      host: true,
      port: PORT,
    },
    root: ".",
    server: {
      host: true,
      open: true,
      port: PORT,
    },
  };
});
