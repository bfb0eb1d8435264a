import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — pascals-triangle is pure arithmetic on number and
  // bigint. It touches no browser or Node.js API, so one build serves both.
  platform: "neutral",
});
