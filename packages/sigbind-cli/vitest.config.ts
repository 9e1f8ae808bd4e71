import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: [
            { find: /^sigbind$/, replacement: fileURLToPath(new URL("../sigbind/src/index.ts", import.meta.url)) },
            {
                find: /^@sigbind\/generator$/,
                replacement: fileURLToPath(new URL("../sigbind-generator/src/index.ts", import.meta.url)),
            },
        ],
    },
    test: {
        include: ["src/**/*.spec.ts"],
        environment: "node",
        testTimeout: 30_000,
    },
});
