/**
 * Core error types for sprocgen
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect"

// Base error type with common fields
interface ErrorBase {
  readonly message: string
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

// Manifest errors
export class ManifestReadFailed extends Data.TaggedError("ManifestReadFailed")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

export class ManifestInvalid extends Data.TaggedError("ManifestInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

export class TypeExpressionInvalid extends Data.TaggedError("TypeExpressionInvalid")<
  ErrorBase & { readonly expression: string; readonly position: number }
> {}

/**
 * Diagnostic ids reported when a marker attribute cannot be resolved.
 * - SP0001: the method-level generation marker
 * - SP0002: the parameter-level raw command marker
 */
export type MarkerDiagnosticId = "SP0001" | "SP0002"

// Synthesis errors
export class MarkerSymbolMissing extends Data.TaggedError("MarkerSymbolMissing")<
  ErrorBase & { readonly id: MarkerDiagnosticId; readonly attribute: string }
> {}

export class UnsupportedType extends Data.TaggedError("UnsupportedType")<
  ErrorBase & {
    readonly type: string
    readonly method?: string
    readonly parameter?: string
  }
> {}

// Emission errors
export class EmitConflict extends Data.TaggedError("EmitConflict")<
  ErrorBase & { readonly path: string; readonly types: readonly string[] }
> {}

export class WriteError extends Data.TaggedError("WriteError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

// Union of all errors for convenience
export type SprocgenError =
  | ConfigNotFound
  | ConfigInvalid
  | ManifestReadFailed
  | ManifestInvalid
  | TypeExpressionInvalid
  | MarkerSymbolMissing
  | UnsupportedType
  | EmitConflict
  | WriteError
