import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to their sources so tests need no build.
export default defineConfig({
    resolve: {
        alias: [
            { find: /^sigbind$/, replacement: fileURLToPath(new URL("./packages/sigbind/src/index.ts", import.meta.url)) },
            {
                find: /^@sigbind\/generator$/,
                replacement: fileURLToPath(new URL("./packages/sigbind-generator/src/index.ts", import.meta.url)),
            },
        ],
    },
    test: {
        include: ["packages/*/src/**/*.spec.ts"],
        environment: "node",
        testTimeout: 30_000,
    },
});
