/**
 * Testing Utilities
 *
 * Helpers for building compilations and running synthesis in tests.
 *
 * ```typescript
 * import { testSynthesize } from "sprocgen/testing"
 *
 * it.effect("generates a scalar method", () =>
 *   Effect.gen(function* () {
 *     const result = yield* testSynthesize({ attributes: [...], types: [...] })
 *     expect(result.units).toHaveLength(1)
 *   })
 * )
 * ```
 */
import { Effect, Either, Schema as S } from "effect";
import type { ResolvedConfig } from "./config.js";
import { makeCompilation, type Compilation } from "./ir/compilation.js";
import { Manifest, type ManifestInput } from "./ir/manifest.js";
import { InflectionLive } from "./services/inflection.js";
import { synthesize, type SynthesisOptions, type SynthesisResult } from "./synth/index.js";
import { DEFAULT_MARKERS } from "./synth/signature.js";
import type { MarkerSymbolMissing, UnsupportedType } from "./errors.js";

/** Both default marker attributes, as a manifest lists them */
export const DEFAULT_MARKER_ATTRIBUTES = [
  `${DEFAULT_MARKERS.method}Attribute`,
  `${DEFAULT_MARKERS.rawCommand}Attribute`,
];

/**
 * Decode a manifest literal, applying schema defaults. Throws on invalid input.
 */
export function testManifest(input: ManifestInput): Manifest {
  return S.decodeUnknownSync(Manifest)(input);
}

/**
 * Build a compilation from a manifest literal. Throws on unparsable type
 * expressions.
 */
export function testCompilation(input: ManifestInput): Compilation {
  return Either.getOrThrow(makeCompilation(testManifest(input)));
}

/**
 * Run synthesis over a manifest literal with the default inflection.
 */
export const testSynthesize = (
  input: ManifestInput,
  options?: SynthesisOptions,
): Effect.Effect<SynthesisResult, MarkerSymbolMissing | UnsupportedType> =>
  synthesize(testCompilation(input), options).pipe(Effect.provide(InflectionLive));

/**
 * Resolved config with defaults, for pipeline tests.
 */
export function testConfig(overrides?: Partial<ResolvedConfig>): ResolvedConfig {
  return {
    manifests: [],
    outputDir: "generated",
    markers: DEFAULT_MARKERS,
    banner: "sprocgen",
    emitAttributes: false,
    defaultContext: "dbContext",
    ...overrides,
  };
}
