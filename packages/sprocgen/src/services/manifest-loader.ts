/**
 * Manifest Loader
 *
 * Reads declaration manifests (JSON) through the platform FileSystem,
 * validates them with Effect Schema and merges them into one Compilation.
 */
import { Effect, Schema as S, ParseResult } from "effect"
import { FileSystem } from "@effect/platform"
import { ManifestInvalid, ManifestReadFailed, type TypeExpressionInvalid } from "../errors.js"
import { makeCompilation, type Compilation } from "../ir/compilation.js"
import { Manifest, type NullableContext } from "../ir/manifest.js"

const decodeManifest = S.decodeUnknown(S.parseJson(Manifest))

/**
 * Read and validate a single manifest file.
 */
export const loadManifest = (
  path: string,
): Effect.Effect<Manifest, ManifestReadFailed | ManifestInvalid, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (cause) =>
          new ManifestReadFailed({
            message: `Failed to read manifest ${path}: ${cause.message}`,
            path,
            cause,
          }),
      ),
    )
    return yield* decodeManifest(text).pipe(
      Effect.mapError(
        (error) =>
          new ManifestInvalid({
            message: `Invalid manifest ${path}`,
            path,
            errors: ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) =>
              issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
            ),
          }),
      ),
    )
  })

export interface CompilationOptions {
  /** Overrides the nullable context of the manifests */
  readonly nullable?: NullableContext | undefined
  /** Attribute classes known to exist besides those the manifests list */
  readonly additionalAttributes?: readonly string[]
}

/**
 * Merge manifests in order. The first manifest decides the nullable context
 * unless overridden.
 */
export const mergeManifests = (manifests: readonly Manifest[], nullable?: NullableContext): Manifest => ({
  nullable: nullable ?? manifests[0]?.nullable ?? "disable",
  attributes: manifests.flatMap((m) => m.attributes),
  types: manifests.flatMap((m) => m.types),
})

/**
 * Load every manifest and build the compilation they describe.
 */
export const loadCompilation = (
  paths: readonly string[],
  options: CompilationOptions = {},
): Effect.Effect<
  Compilation,
  ManifestReadFailed | ManifestInvalid | TypeExpressionInvalid,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const manifests = yield* Effect.forEach(paths, (path) =>
      loadManifest(path).pipe(Effect.tap((m) => Effect.logDebug(`${path}: ${m.types.length} types`))),
    )
    const merged = mergeManifests(manifests, options.nullable)
    return yield* makeCompilation(merged, { additionalAttributes: options.additionalAttributes ?? [] })
  })
