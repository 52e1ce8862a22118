/**
 * Generate Orchestration Function
 *
 * Threads together the full code generation pipeline:
 * 1. Load config
 * 2. Load manifests into a compilation
 * 3. Synthesize generated units
 * 4. Write files
 *
 * Logging:
 * - Effect.log (INFO) - Progress messages shown by default
 * - Effect.logDebug (DEBUG) - Detailed info (strategies, file lists)
 *
 * Configure via Logger.withMinimumLogLevel at the call site.
 */
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import type { ResolvedConfig } from "./config.js"
import { ConfigLoaderService, ConfigLoaderLive } from "./services/config-loader.js"
import { FileWriterLive, FileWriterSvc, type WriteResult } from "./services/file-writer.js"
import { makeInflectionLayer } from "./services/inflection.js"
import { loadCompilation } from "./services/manifest-loader.js"
import { attributeClassName } from "./synth/attributes.js"
import type { GeneratedUnit } from "./synth/emit.js"
import { synthesize } from "./synth/index.js"
import {
  ConfigNotFound,
  ConfigInvalid,
  EmitConflict,
  ManifestInvalid,
  ManifestReadFailed,
  MarkerSymbolMissing,
  TypeExpressionInvalid,
  UnsupportedType,
  WriteError,
} from "./errors.js"

/**
 * Options for the generate function
 */
export interface GenerateOptions {
  /** Path to config file (optional - will search if not provided) */
  readonly configPath?: string | undefined
  /** Directory to search for config from (default: cwd) */
  readonly searchFrom?: string | undefined
  /** Override output directory from config */
  readonly outputDir?: string | undefined
  /** Dry run - don't write files, just return what would be written */
  readonly dryRun?: boolean
}

/**
 * Result of a generate operation
 */
export interface GenerateResult {
  /** The loaded configuration */
  readonly config: ResolvedConfig
  /** Generated units, marker attribute source last */
  readonly units: readonly GeneratedUnit[]
  /** Nested types that carried marked methods */
  readonly skipped: readonly string[]
  /** File write results */
  readonly writeResults: readonly WriteResult[]
}

/**
 * All possible errors from the generate pipeline
 */
export type GenerateError =
  | ConfigNotFound
  | ConfigInvalid
  | ManifestReadFailed
  | ManifestInvalid
  | TypeExpressionInvalid
  | MarkerSymbolMissing
  | UnsupportedType
  | EmitConflict
  | WriteError

/**
 * Fail when two units would land in the same file, e.g. `A.B_C` and `A_B.C`.
 */
export const checkConflicts = (units: readonly GeneratedUnit[]): Effect.Effect<void, EmitConflict> => {
  const byFile = new Map<string, string[]>()
  for (const unit of units) {
    const owners = byFile.get(unit.fileName) ?? []
    owners.push(unit.typeName === "" ? unit.fileName : unit.typeName)
    byFile.set(unit.fileName, owners)
  }
  for (const [fileName, owners] of byFile) {
    if (owners.length > 1) {
      return Effect.fail(
        new EmitConflict({
          message: `Multiple types map to ${fileName}: ${owners.join(", ")}`,
          path: fileName,
          types: owners,
        }),
      )
    }
  }
  return Effect.void
}

/**
 * Run synthesis and writing for an already loaded config.
 */
export const generateWith = (
  config: ResolvedConfig,
  options: Pick<GenerateOptions, "outputDir" | "dryRun"> = {},
): Effect.Effect<
  Omit<GenerateResult, "config">,
  Exclude<GenerateError, ConfigNotFound | ConfigInvalid>,
  FileWriterSvc | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    yield* Effect.log(`Loading ${config.manifests.length} manifest(s)...`)
    const compilation = yield* loadCompilation(config.manifests, {
      nullable: config.nullable,
      additionalAttributes: config.emitAttributes
        ? [attributeClassName(config.markers.method), attributeClassName(config.markers.rawCommand)]
        : [],
    })
    yield* Effect.log(`Found ${compilation.types.length} types`)
    yield* Effect.logDebug(`Nullable context: ${compilation.nullableContext}`)

    const result = yield* synthesize(compilation, {
      markers: config.markers,
      banner: config.banner,
      emitAttributes: config.emitAttributes,
      defaultContextName: config.defaultContext,
    }).pipe(Effect.provide(makeInflectionLayer(config.inflection)))

    const units = result.attributes === undefined ? result.units : [...result.units, result.attributes]
    yield* checkConflicts(units)

    const methodCount = result.units.reduce((n, unit) => n + unit.methods.length, 0)
    yield* Effect.log(`Generated ${methodCount} methods in ${result.units.length} types`)
    if (result.skipped.length > 0) {
      yield* Effect.logDebug(`Skipped nested types: ${result.skipped.join(", ")}`)
    }

    const outputDir = options.outputDir ?? config.outputDir
    yield* Effect.log(`Writing to ${outputDir}...`)

    const writer = yield* FileWriterSvc
    const writeResults = yield* writer.writeAll(units, {
      outputDir,
      dryRun: options.dryRun ?? false,
    })

    yield* Effect.forEach(writeResults, (r) => {
      const status = r.reason === "dry-run" ? "(dry run)" : r.written ? "✓" : "–"
      return Effect.logDebug(`${status} ${r.path}`)
    })

    const written = writeResults.filter((r) => r.written).length
    const dryRunSuffix = options.dryRun ? " (dry run)" : ""
    yield* Effect.log(`Wrote ${written} files${dryRunSuffix}`)

    return { units, skipped: result.skipped, writeResults }
  })

/**
 * The main generate pipeline
 */
export const generate = (
  options: GenerateOptions = {},
): Effect.Effect<
  GenerateResult,
  GenerateError,
  ConfigLoaderService | FileWriterSvc | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    yield* Effect.logDebug("Loading configuration...")
    const configLoader = yield* ConfigLoaderService
    const config = yield* configLoader.load({
      configPath: options.configPath,
      searchFrom: options.searchFrom,
    })
    const result = yield* generateWith(config, options)
    return { config, ...result }
  })

/**
 * Layer that provides all services needed for generate()
 */
export const GenerateLive = Layer.merge(ConfigLoaderLive, FileWriterLive)

/**
 * Run generate with all dependencies provided
 *
 * This is the main entry point for programmatic usage.
 * Requires FileSystem and Path from @effect/platform.
 */
export const runGenerate = (
  options: GenerateOptions = {},
): Effect.Effect<GenerateResult, GenerateError, FileSystem.FileSystem | Path.Path> =>
  generate(options).pipe(Effect.provide(GenerateLive))
