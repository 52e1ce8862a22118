/**
 * Inflection Service - naming transformations
 *
 * Maps C# identifiers onto database-facing names:
 * - parameter identifiers → bound parameter names (`clientId` → `client_id`)
 * - entity type names → fallback DbSet accessor names (`Item` → `Items`)
 *
 * Users configure transform chains (e.g., ["snakeCase"]) which are applied
 * in order. Empty chains preserve names as-is (identity).
 */
import { Context, Layer, String as Str } from "effect"

// ============================================================================
// Reserved Words
// ============================================================================

const RESERVED_WORDS = new Set([
  "abstract", "as", "base", "bool", "break", "byte", "case", "catch", "char",
  "checked", "class", "const", "continue", "decimal", "default", "delegate", "do",
  "double", "else", "enum", "event", "explicit", "extern", "false", "finally",
  "fixed", "float", "for", "foreach", "goto", "if", "implicit", "in", "int",
  "interface", "internal", "is", "lock", "long", "namespace", "new", "null",
  "object", "operator", "out", "override", "params", "private", "protected",
  "public", "readonly", "ref", "return", "sbyte", "sealed", "short", "sizeof",
  "stackalloc", "static", "string", "struct", "switch", "this", "throw", "true",
  "try", "typeof", "uint", "ulong", "unchecked", "unsafe", "ushort", "using",
  "virtual", "void", "volatile", "while",
])

// ============================================================================
// Simple Pluralization (naive, covers common cases)
// ============================================================================

const pluralize = (word: string): string => {
  if (
    word.endsWith("s") ||
    word.endsWith("x") ||
    word.endsWith("z") ||
    word.endsWith("ch") ||
    word.endsWith("sh")
  ) {
    return word + "es"
  }
  if (word.endsWith("y") && !/[aeiou]y$/i.test(word)) {
    return word.slice(0, -1) + "ies"
  }
  return word + "s"
}

const singularize = (word: string): string => {
  if (word.endsWith("ies") && word.length > 3) {
    return word.slice(0, -3) + "y"
  }
  if (
    word.endsWith("es") &&
    (word.endsWith("sses") ||
      word.endsWith("xes") ||
      word.endsWith("zes") ||
      word.endsWith("ches") ||
      word.endsWith("shes"))
  ) {
    return word.slice(0, -2)
  }
  if (word.endsWith("s") && !word.endsWith("ss") && word.length > 1) {
    return word.slice(0, -1)
  }
  return word
}

/**
 * Split words at lower→upper boundaries and before the last capital of an
 * acronym: `clientId` → `client_id`, `PersonID` → `person_id`,
 * `HTTPServer` → `http_server`.
 */
const snakeCase = (word: string): string =>
  word
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase()

// ============================================================================
// Transform Registry
// ============================================================================

/**
 * Available transform names that can be used in transform chains.
 */
export const TRANSFORM_NAMES = [
  "camelCase",
  "pascalCase",
  "snakeCase",
  "kebabCase",
  "singularize",
  "pluralize",
  "capitalize",
  "uncapitalize",
  "lowercase",
  "uppercase",
] as const

export type TransformName = (typeof TRANSFORM_NAMES)[number]

/**
 * Registry of named transforms.
 * Each transform is a pure function: string → string
 */
const transformRegistry: Record<TransformName, (s: string) => string> = {
  camelCase: Str.snakeToCamel,
  pascalCase: Str.snakeToPascal,
  snakeCase,
  kebabCase: (s) => snakeCase(s).replace(/_/g, "-"),
  singularize,
  pluralize,
  capitalize: Str.capitalize,
  uncapitalize: Str.uncapitalize,
  lowercase: (s) => s.toLowerCase(),
  uppercase: (s) => s.toUpperCase(),
}

/**
 * A chain of transforms to apply in order.
 * Empty array = identity (preserve as-is).
 */
export type TransformChain = readonly TransformName[]

/**
 * Apply a chain of transforms to a string.
 * Returns the input unchanged if chain is empty.
 */
export function applyTransformChain(input: string, chain: TransformChain): string {
  return chain.reduce((s, name) => transformRegistry[name](s), input)
}

// ============================================================================
// Core Inflection Interface
// ============================================================================

/**
 * Core inflection interface - shared naming transformations
 */
export interface CoreInflection {
  /** Prefix C# keywords with `@` so they stay valid identifiers */
  readonly safeIdentifier: (text: string) => string
  /** C# parameter identifier → bound parameter name (without the `@` marker) */
  readonly parameterName: (identifier: string) => string
  /** Entity type name → DbSet accessor name, used when no DbSet property matches */
  readonly entitySetName: (typeName: string) => string
}

/** Service tag */
export class Inflection extends Context.Tag("Inflection")<Inflection, CoreInflection>() {}

// ============================================================================
// Inflection Configuration
// ============================================================================

/**
 * Configuration for customizing inflection behavior.
 *
 * @example
 * ```typescript
 * const config: InflectionConfig = {
 *   // clientId → client_id (default)
 *   parameterName: ["snakeCase"],
 *
 *   // Item → Items, Category → Categories (default)
 *   entitySet: ["pluralize"],
 * }
 * ```
 */
export interface InflectionConfig {
  /**
   * Transform chain for parameter identifier → bound parameter name.
   * Default: ["snakeCase"]
   */
  readonly parameterName?: TransformChain

  /**
   * Transform chain for entity type name → DbSet accessor name.
   * Default: ["pluralize"]
   */
  readonly entitySet?: TransformChain
}

const DEFAULT_PARAMETER_CHAIN: TransformChain = ["snakeCase"]
const DEFAULT_ENTITY_SET_CHAIN: TransformChain = ["pluralize"]

/**
 * Create an inflection instance from configuration.
 * Omitted chains fall back to the defaults.
 */
export function createInflection(config?: InflectionConfig): CoreInflection {
  const parameterChain = config?.parameterName ?? DEFAULT_PARAMETER_CHAIN
  const entitySetChain = config?.entitySet ?? DEFAULT_ENTITY_SET_CHAIN

  return {
    safeIdentifier: (text) => (RESERVED_WORDS.has(text) ? `@${text}` : text),
    parameterName: (identifier) => applyTransformChain(identifier.replace(/^@/, ""), parameterChain),
    entitySetName: (typeName) => applyTransformChain(typeName, entitySetChain),
  }
}

/**
 * Default inflection - snake_case parameter names, pluralized entity sets
 */
export const defaultInflection: CoreInflection = createInflection()

// ============================================================================
// Layers
// ============================================================================

/**
 * Live layer with default inflection
 */
export const InflectionLive = Layer.succeed(Inflection, defaultInflection)

/**
 * Create an inflection layer from configuration
 */
export function makeInflectionLayer(config?: InflectionConfig): Layer.Layer<Inflection> {
  return config === undefined ? InflectionLive : Layer.succeed(Inflection, createInflection(config))
}
