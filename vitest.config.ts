import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["__tests__/**/*.test.ts", "engine/**/__tests__/**/*.test.ts", "plugins/**/__tests__/**/*.test.ts", "config/**/__tests__/**/*.test.ts"],
        exclude: ["**/node_modules/**", "**/dist/**"]
    }
});
