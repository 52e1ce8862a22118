/**
 * Declaration manifest schema
 *
 * A manifest is the hand-off between whatever discovers declarations in a C#
 * project and the synthesis engine. It lists the declared types with their
 * fields, properties, base type and methods. Type references are C# type
 * expressions (see ./type-expression.ts).
 */
import { Schema as S } from "effect"

/**
 * Nullable reference type context of the compilation.
 * Mirrors the `<Nullable>` project setting.
 */
export const NullableContext = S.Literal("disable", "enable", "warnings", "annotations")
export type NullableContext = S.Schema.Type<typeof NullableContext>

export const Accessibility = S.Literal(
  "public",
  "internal",
  "protected",
  "private",
  "protected internal",
  "private protected",
)
export type Accessibility = S.Schema.Type<typeof Accessibility>

/**
 * An attribute applied to a method or parameter, e.g.
 * `[SqlProcedure("sp_GetItems", EntitySet = "Items")]` becomes
 * `{ name: "SqlProcedure", arguments: ["sp_GetItems"], named: { EntitySet: "Items" } }`.
 */
export const AttributeUsage = S.Struct({
  name: S.String,
  arguments: S.optionalWith(S.Array(S.String), { default: () => [] }),
  named: S.optionalWith(S.Record({ key: S.String, value: S.String }), { default: () => ({}) }),
})
export type AttributeUsage = S.Schema.Type<typeof AttributeUsage>

export const ParameterDeclaration = S.Struct({
  name: S.String,
  type: S.String,
  /** `out` and `ref` map to Out and InOut directions */
  modifier: S.optionalWith(S.Literal("none", "out", "ref"), { default: () => "none" as const }),
  attributes: S.optionalWith(S.Array(AttributeUsage), { default: () => [] }),
})
export type ParameterDeclaration = S.Schema.Type<typeof ParameterDeclaration>

export const MethodDeclaration = S.Struct({
  name: S.String,
  accessibility: S.optionalWith(Accessibility, { default: () => "private" as const }),
  returnType: S.String,
  parameters: S.optionalWith(S.Array(ParameterDeclaration), { default: () => [] }),
  attributes: S.optionalWith(S.Array(AttributeUsage), { default: () => [] }),
})
export type MethodDeclaration = S.Schema.Type<typeof MethodDeclaration>

/** A field or property */
export const MemberDeclaration = S.Struct({
  name: S.String,
  type: S.String,
})
export type MemberDeclaration = S.Schema.Type<typeof MemberDeclaration>

export const TypeDeclaration = S.Struct({
  name: S.String,
  /** Empty for the global namespace */
  namespace: S.optionalWith(S.String, { default: () => "" }),
  /** Name of the enclosing type for nested declarations */
  containingType: S.optional(S.String),
  kind: S.optionalWith(S.Literal("class", "struct", "record", "interface"), {
    default: () => "class" as const,
  }),
  baseType: S.optional(S.String),
  fields: S.optionalWith(S.Array(MemberDeclaration), { default: () => [] }),
  properties: S.optionalWith(S.Array(MemberDeclaration), { default: () => [] }),
  methods: S.optionalWith(S.Array(MethodDeclaration), { default: () => [] }),
})
export type TypeDeclaration = S.Schema.Type<typeof TypeDeclaration>

export const Manifest = S.Struct({
  nullable: S.optionalWith(NullableContext, { default: () => "disable" as const }),
  /**
   * Attribute classes already present in the compilation.
   * The generated attribute source adds the marker attributes on top.
   */
  attributes: S.optionalWith(S.Array(S.String), { default: () => [] }),
  types: S.Array(TypeDeclaration),
})
export type Manifest = S.Schema.Type<typeof Manifest>

/** Encoded (input) form of a manifest, with every defaulted key optional */
export type ManifestInput = S.Schema.Encoded<typeof Manifest>
