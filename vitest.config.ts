import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/**/*.test.ts"],
        // sharp resizes of full-size test images are slow on cold CI machines
        testTimeout: 20_000,
    },
});
