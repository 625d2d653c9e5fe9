import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  target: "node20",
  // The workspace library ships TypeScript sources, so it is bundled in
  noExternal: ["textextend"],
  banner: {
    js: "#!/usr/bin/env node",
  },
});
