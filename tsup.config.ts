import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    "cli/powerProfile": "src/cli/powerProfile.ts",
    "cli/notificationHistory": "src/cli/notificationHistory.ts",
  },
  format: ["esm"],
  target: "node20",
  outDir: "dist",
  clean: true,
  sourcemap: true,
  splitting: false,
  dts: false,
  banner: {
    js: "#!/usr/bin/env node",
  },
});
