import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname( fileURLToPath( import.meta.url ) );

// Workers inherit this; date tests expect a zone with daylight saving
process.env.TZ = "America/New_York";

export default defineConfig( {
  resolve: {
    alias: {
      "@": path.join( rootDir, "src" ),
    },
  },
  test: {
    include: [ "test/**/*.test.ts" ],
    environment: "node",
    env: {
      LOG_STDOUT: "false",
      LOG_LEVEL: "silent",
      TZ: "America/New_York",
    },
  },
} );
