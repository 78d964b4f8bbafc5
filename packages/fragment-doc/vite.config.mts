import path from "path"
import { defineConfig } from "vite"
import dts from "vite-plugin-dts"

const resolvePath = (str: string) => path.resolve(__dirname, str)

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: resolvePath("./src/index.ts"),
      name: "fragment-doc",
    },
    sourcemap: "inline",
    minify: false,

    rollupOptions: {
      external: ["ajv", "ajv-draft-04", "fast-deep-equal", "immer"],

      output: [
        {
          format: "esm",
          entryFileNames: "fragment-doc.esm.mjs",
        },
        {
          name: "fragmentDoc",
          format: "umd",
          globals: {
            ajv: "Ajv",
            "ajv-draft-04": "AjvDraft04",
            "fast-deep-equal": "fastDeepEqual",
            immer: "immer",
          },
        },
      ],
    },
  },
  plugins: [
    dts({
      tsconfigPath: resolvePath("../../tsconfig.json"),
      include: ["src"],
      outDir: resolvePath("./dist/types"),
    }),
  ],
})
