/**
 * Generate Pipeline Tests
 *
 * Runs the full pipeline against manifests written to temp directories.
 */
import { it, describe, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { checkConflicts, generate, generateWith, GenerateLive } from "../generate.js"
import type { ManifestInput } from "../ir/manifest.js"
import { FileWriterLive } from "../services/file-writer.js"
import type { GeneratedUnit } from "../synth/emit.js"
import { DEFAULT_MARKER_ATTRIBUTES, testConfig } from "../testing.js"

const TestLayer = Layer.merge(FileWriterLive, NodeContext.layer)

const manifest = (attributes: readonly string[]): ManifestInput => ({
  attributes,
  types: [
    {
      name: "Repo",
      namespace: "App",
      fields: [{ name: "conn", type: "DbConnection" }],
      methods: [{ name: "Count", returnType: "int", attributes: [{ name: "SqlProcedure", arguments: ["sp_count"] }] }],
    },
    { name: "Plain", namespace: "App" },
  ],
})

const unit = (fileName: string, typeName: string): GeneratedUnit => ({
  fileName,
  typeName,
  methods: [],
  content: "",
})

describe("generateWith", () => {
  it.effect("writes one file per type with marked methods", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "generate-test-" })
      const manifestPath = path.join(tmpDir, "declarations.json")
      const outputDir = path.join(tmpDir, "generated")

      try {
        yield* fs.writeFileString(manifestPath, JSON.stringify(manifest(DEFAULT_MARKER_ATTRIBUTES)))
        const result = yield* generateWith(testConfig({ manifests: [manifestPath], outputDir }))

        expect(result.units.map((u) => u.fileName)).toEqual(["App_Repo.g.cs"])
        expect(result.writeResults).toEqual([{ path: path.join(outputDir, "App_Repo.g.cs"), written: true }])
        const content = yield* fs.readFileString(path.join(outputDir, "App_Repo.g.cs"))
        expect(content).toBe(result.units[0]?.content)

        const again = yield* generateWith(testConfig({ manifests: [manifestPath], outputDir }))
        expect(again.writeResults.map((r) => r.reason)).toEqual(["unchanged"])
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )

  it.effect("writes nothing on a dry run", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "generate-test-" })
      const manifestPath = path.join(tmpDir, "declarations.json")

      try {
        yield* fs.writeFileString(manifestPath, JSON.stringify(manifest(DEFAULT_MARKER_ATTRIBUTES)))
        const result = yield* generateWith(
          testConfig({ manifests: [manifestPath], outputDir: path.join(tmpDir, "generated") }),
          { dryRun: true },
        )
        expect(result.writeResults.map((r) => [r.written, r.reason])).toEqual([[false, "dry-run"]])
        expect(yield* fs.exists(path.join(tmpDir, "generated"))).toBe(false)
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )

  it.effect("adds the marker attribute source when asked", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "generate-test-" })
      const manifestPath = path.join(tmpDir, "declarations.json")

      try {
        yield* fs.writeFileString(manifestPath, JSON.stringify(manifest([])))
        const result = yield* generateWith(
          testConfig({ manifests: [manifestPath], emitAttributes: true }),
          { outputDir: path.join(tmpDir, "out") },
        )
        expect(result.units.map((u) => u.fileName)).toEqual(["App_Repo.g.cs", "SqlProcedureAttribute.g.cs"])
        expect(result.writeResults.map((r) => r.path)).toEqual([
          path.join(tmpDir, "out", "App_Repo.g.cs"),
          path.join(tmpDir, "out", "SqlProcedureAttribute.g.cs"),
        ])
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )

  it.effect("fails when the marker attributes are missing", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "generate-test-" })
      const manifestPath = path.join(tmpDir, "declarations.json")

      try {
        yield* fs.writeFileString(manifestPath, JSON.stringify(manifest([])))
        const error = yield* Effect.flip(generateWith(testConfig({ manifests: [manifestPath] })))
        expect(error._tag).toBe("MarkerSymbolMissing")
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )
})

describe("generate", () => {
  it.effect("loads the config file and resolves paths against it", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "generate-test-" })

      try {
        yield* fs.writeFileString(
          path.join(tmpDir, "declarations.json"),
          JSON.stringify(manifest(DEFAULT_MARKER_ATTRIBUTES)),
        )
        yield* fs.writeFileString(
          path.join(tmpDir, "sprocgen.config.json"),
          JSON.stringify({ manifests: ["declarations.json"], outputDir: "obj/sql" }),
        )
        const result = yield* generate({ searchFrom: tmpDir })
        expect(result.config.outputDir).toBe(path.join(tmpDir, "obj/sql"))
        expect(result.writeResults.map((r) => r.path)).toEqual([path.join(tmpDir, "obj/sql", "App_Repo.g.cs")])
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(Layer.merge(GenerateLive, NodeContext.layer)))
  )
})

describe("checkConflicts", () => {
  it.effect("accepts distinct file names", () =>
    checkConflicts([unit("A_B.g.cs", "A.B"), unit("A_C.g.cs", "A.C")])
  )

  it.effect("names every type mapped to the same file", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(checkConflicts([unit("A_B_C.g.cs", "A.B_C"), unit("A_B_C.g.cs", "A_B.C")]))
      expect(error.message).toBe("Multiple types map to A_B_C.g.cs: A.B_C, A_B.C")
      expect(error.types).toEqual(["A.B_C", "A_B.C"])
    })
  )
})
