import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    // Network tests bind loopback sockets; give slow CI machines some room.
    testTimeout: 30000,
  },
});
