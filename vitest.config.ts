import { fileURLToPath } from "node:url"
import { defineConfig, defineProject } from "vitest/config"

const alias = {
  "@handoff/future": fileURLToPath(
    new URL(`./packages/future/src/index.ts`, import.meta.url)
  ),
  "@handoff/join": fileURLToPath(
    new URL(`./packages/join/src/index.ts`, import.meta.url)
  ),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `future`,
          include: [`packages/future/**/*.test.ts`],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: `join`,
          include: [`packages/join/**/*.test.ts`],
        },
        resolve: { alias },
      }),
    ],
    coverage: {
      provider: `v8`,
      reporter: [`text`, `json`, `html`],
    },
  },
})
