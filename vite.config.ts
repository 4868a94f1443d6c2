/// <reference types="vitest" />
import { defineConfig } from "vite";
import { configDefaults } from "vitest/config";

// https://vitejs.dev/config/
export default defineConfig({
    test: {
        globals: true,
        include: ["test/**/*.spec.ts"],
        exclude: [...configDefaults.exclude, "dist/"],
        coverage: {
            provider: "v8",
            include: ["src/**"],
        },
    },
});
