import { defineConfig, loadEnv } from "vite";
import react from "@vitejs/plugin-react";
import { DEPTH_LIMIT_ENV } from "./src/config";
import { solverApi } from "./src/server/solverApi";

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), "");
  return {
    plugins: [react(), solverApi({ depthLimit: env[DEPTH_LIMIT_ENV] })],
  };
});
