import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "graphql-bearer-client",
        environment: "node",
        include: ["test/**/*.test.ts"],
        env: {
            LOG_LEVEL: "silent",
        },
    },
});
