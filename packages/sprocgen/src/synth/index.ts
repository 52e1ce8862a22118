/**
 * Synthesis entry point
 *
 * Compilation in, generated units out. Types are visited in first-appearance
 * order and methods in declaration order, so output is deterministic.
 */
import { Array as Arr, Effect } from "effect"
import { MarkerSymbolMissing, type UnsupportedType } from "../errors.js"
import type { Compilation } from "../ir/compilation.js"
import { Inflection } from "../services/inflection.js"
import { emitAttributeSource } from "./attributes.js"
import { DEFAULT_CONTEXT_NAME, resolveConnectionStrategy } from "./connection.js"
import { DEFAULT_BANNER, emitUnit, planMethod, type EmitContext, type GeneratedUnit } from "./emit.js"
import { DEFAULT_MARKERS, extractBinding, type MarkerNames } from "./signature.js"

export interface SynthesisOptions {
  readonly markers?: MarkerNames
  /** Tool name written into generated headers */
  readonly banner?: string
  /** Also emit the marker attribute classes */
  readonly emitAttributes?: boolean
  /** Context field assumed when a type has neither a connection nor a context */
  readonly defaultContextName?: string
}

export interface SynthesisResult {
  readonly units: readonly GeneratedUnit[]
  /** Marker attribute source, when requested */
  readonly attributes: GeneratedUnit | undefined
  /** Nested types with marked methods; not generated */
  readonly skipped: readonly string[]
}

/**
 * Fail when the marker attribute classes cannot be found. Emitting the
 * attribute source makes both available.
 */
export const checkMarkers = (
  compilation: Compilation,
  markers: MarkerNames,
  emitAttributes: boolean,
): Effect.Effect<void, MarkerSymbolMissing> => {
  if (emitAttributes) return Effect.void
  if (!compilation.hasAttribute(markers.method)) {
    return Effect.fail(
      new MarkerSymbolMissing({
        message: `Marker attribute '${markers.method}' was not found in the compilation`,
        id: "SP0001",
        attribute: markers.method,
      }),
    )
  }
  if (!compilation.hasAttribute(markers.rawCommand)) {
    return Effect.fail(
      new MarkerSymbolMissing({
        message: `Marker attribute '${markers.rawCommand}' was not found in the compilation`,
        id: "SP0002",
        attribute: markers.rawCommand,
      }),
    )
  }
  return Effect.void
}

export const synthesize = (
  compilation: Compilation,
  options: SynthesisOptions = {},
): Effect.Effect<SynthesisResult, MarkerSymbolMissing | UnsupportedType, Inflection> =>
  Effect.gen(function* () {
    const inflection = yield* Inflection
    const markers = options.markers ?? DEFAULT_MARKERS
    const banner = options.banner ?? DEFAULT_BANNER
    const emitAttributes = options.emitAttributes ?? false

    yield* checkMarkers(compilation, markers, emitAttributes)

    const units: GeneratedUnit[] = []
    const skipped: string[] = []

    for (const declared of compilation.types) {
      const bindings = Arr.filterMap(declared.methods, (method) => extractBinding(method, markers))
      if (bindings.length === 0) continue

      const typeName = declared.type.fullName
      if (declared.type.containingType !== undefined) {
        yield* Effect.logDebug(`Skipping nested type ${typeName}`)
        skipped.push(typeName)
        continue
      }

      const connection = resolveConnectionStrategy(
        declared.type,
        options.defaultContextName ?? DEFAULT_CONTEXT_NAME,
      )
      const context: EmitContext = {
        inflection,
        nullable: compilation.nullableContext,
        connection,
        banner,
      }

      const plans = yield* Effect.forEach(bindings, (binding) =>
        Effect.gen(function* () {
          if (binding.ignoredOverrides.length > 0) {
            yield* Effect.logDebug(
              `Ignoring marker arguments on ${binding.name}: ${binding.ignoredOverrides.join(", ")}`,
            )
          }
          return yield* planMethod(binding, context)
        }),
      ).pipe(
        Effect.tap(() => Effect.logDebug(`Connection strategy: ${connection._tag}`)),
        Effect.annotateLogs("type", typeName),
      )

      units.push(emitUnit(declared, plans, context))
    }

    return {
      units,
      attributes: emitAttributes ? emitAttributeSource(markers, banner) : undefined,
      skipped,
    }
  })

