/**
 * Signature Extractor
 *
 * Turns a method marked with the generation attribute into a ProcedureBinding:
 * the normalized description every later stage works from.
 */
import { Option } from "effect"
import { normalizeAttributeName, type MethodSymbol, type ParameterModifier } from "../ir/compilation.js"
import type { Accessibility, AttributeUsage } from "../ir/manifest.js"
import type { TypeDescriptor } from "../ir/type-descriptor.js"

/**
 * Attribute names recognized as markers.
 */
export interface MarkerNames {
  /** Method-level generation marker */
  readonly method: string
  /** Parameter-level marker: the argument carries the command text */
  readonly rawCommand: string
}

export const DEFAULT_MARKERS: MarkerNames = {
  method: "SqlProcedure",
  rawCommand: "RawCommand",
}

/**
 * Named marker arguments that change the generated body.
 * - `EntitySet`: DbSet accessor used by the EF Core strategy
 */
export const RECOGNIZED_OVERRIDES = ["EntitySet"] as const
export type OverrideName = (typeof RECOGNIZED_OVERRIDES)[number]

export type ParameterDirection = "In" | "Out" | "InOut"

export interface ParameterSpec {
  /** Identifier as declared */
  readonly internalName: string
  readonly declaredType: TypeDescriptor
  readonly direction: ParameterDirection
  /** Supplies the command text; never bound */
  readonly isRawCommand: boolean
}

export type CommandSource =
  | { readonly _tag: "RawText"; readonly parameter: string }
  | { readonly _tag: "NamedProcedure"; readonly name: string }

export interface ProcedureBinding {
  readonly name: string
  readonly visibility: Accessibility
  readonly returnType: TypeDescriptor
  /** Declaration order */
  readonly parameters: readonly ParameterSpec[]
  readonly commandSource: CommandSource
  readonly overrides: Readonly<Partial<Record<OverrideName, string>>>
  /** Named marker arguments that were not recognized */
  readonly ignoredOverrides: readonly string[]
}

const directionOf = (modifier: ParameterModifier): ParameterDirection => {
  switch (modifier) {
    case "none":
      return "In"
    case "out":
      return "Out"
    case "ref":
      return "InOut"
  }
}

const isOverrideName = (key: string): key is OverrideName =>
  RECOGNIZED_OVERRIDES.some((name) => name === key)

export const findAttribute = (
  attributes: readonly AttributeUsage[],
  name: string,
): AttributeUsage | undefined => {
  const wanted = normalizeAttributeName(name)
  return attributes.find((attribute) => normalizeAttributeName(attribute.name) === wanted)
}

/**
 * Extract a ProcedureBinding, or None when the method carries no marker.
 *
 * The first parameter marked as raw command text becomes the command source;
 * otherwise the marker's positional argument names the stored procedure,
 * falling back to the method name.
 */
export function extractBinding(
  method: MethodSymbol,
  markers: MarkerNames = DEFAULT_MARKERS,
): Option.Option<ProcedureBinding> {
  const marker = findAttribute(method.attributes, markers.method)
  if (marker === undefined) return Option.none()

  const parameters = method.parameters.map(
    (p): ParameterSpec => ({
      internalName: p.name,
      declaredType: p.type,
      direction: directionOf(p.modifier),
      isRawCommand: findAttribute(p.attributes, markers.rawCommand) !== undefined,
    }),
  )

  const raw = parameters.find((p) => p.isRawCommand)
  const commandSource: CommandSource =
    raw !== undefined
      ? { _tag: "RawText", parameter: raw.internalName }
      : { _tag: "NamedProcedure", name: marker.arguments[0] ?? method.name }

  const overrides: Partial<Record<OverrideName, string>> = {}
  const ignoredOverrides: string[] = []
  for (const [key, value] of Object.entries(marker.named)) {
    if (isOverrideName(key)) overrides[key] = value
    else ignoredOverrides.push(key)
  }

  return Option.some({
    name: method.name,
    visibility: method.accessibility,
    returnType: method.returnType,
    parameters,
    commandSource,
    overrides,
    ignoredOverrides,
  })
}

/**
 * Parameters that become bound parameters, in declaration order.
 */
export const boundParameters = (binding: ProcedureBinding): readonly ParameterSpec[] =>
  binding.parameters.filter((p) => !p.isRawCommand)
