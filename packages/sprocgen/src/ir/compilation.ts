/**
 * Compilation model
 *
 * Builds a symbol table from a decoded manifest and resolves type expressions
 * into TypeDescriptors. Partial declarations of the same type (same
 * namespace-qualified name) are merged in manifest order.
 *
 * Resolution order for a name:
 * 1. C# keywords and System primitives (`int`, `Int32`, `System.Int32`)
 * 2. `Nullable<T>`
 * 3. Types declared in the manifest (qualified, then by enclosing namespaces,
 *    then by a unique simple name)
 * 4. Well-known framework types (collections, ADO.NET, EF Core)
 * 5. Anything else is an opaque reference type with no members
 */
import { Either } from "effect"
import { TypeExpressionInvalid } from "../errors.js"
import type {
  Accessibility,
  AttributeUsage,
  Manifest,
  MemberDeclaration,
  NullableContext,
  TypeDeclaration,
} from "./manifest.js"
import type { MemberDescriptor, SpecialType, TypeDescriptor } from "./type-descriptor.js"
import {
  isArrayExpression,
  parseTypeExpression,
  rankSpecifier,
  type TypeExpression,
} from "./type-expression.js"

// ============================================================================
// Symbols
// ============================================================================

export type ParameterModifier = "none" | "out" | "ref"

export interface ParameterSymbol {
  readonly name: string
  readonly type: TypeDescriptor
  readonly modifier: ParameterModifier
  readonly attributes: readonly AttributeUsage[]
  readonly ordinal: number
}

export interface MethodSymbol {
  readonly name: string
  readonly accessibility: Accessibility
  readonly returnType: TypeDescriptor
  readonly parameters: readonly ParameterSymbol[]
  readonly attributes: readonly AttributeUsage[]
}

/**
 * A type declared in the manifest together with its methods.
 */
export interface DeclaredType {
  readonly type: TypeDescriptor
  readonly kind: TypeDeclaration["kind"]
  readonly methods: readonly MethodSymbol[]
}

export interface Compilation {
  readonly nullableContext: NullableContext
  /** Declared types in first-appearance order */
  readonly types: readonly DeclaredType[]
  /** Whether an attribute class with this name exists in the compilation */
  readonly hasAttribute: (name: string) => boolean
  /** Resolve a type expression as seen from `scope` (a namespace) */
  readonly resolveType: (
    text: string,
    scope?: string,
  ) => Either.Either<TypeDescriptor, TypeExpressionInvalid>
}

// ============================================================================
// Well-known types
// ============================================================================

const SPECIAL_DISPLAY: Record<SpecialType, string> = {
  String: "string",
  Boolean: "bool",
  Byte: "byte",
  SByte: "sbyte",
  Int16: "short",
  UInt16: "ushort",
  Int32: "int",
  UInt32: "uint",
  Int64: "long",
  UInt64: "ulong",
  Single: "float",
  Double: "double",
  Decimal: "decimal",
  DateTime: "DateTime",
  Char: "char",
  Object: "object",
  Void: "void",
}

const SPECIAL_TYPES: readonly SpecialType[] = [
  "String", "Boolean", "Byte", "SByte", "Int16", "UInt16", "Int32", "UInt32",
  "Int64", "UInt64", "Single", "Double", "Decimal", "DateTime", "Char", "Object", "Void",
]

const KEYWORDS: ReadonlyMap<string, SpecialType> = new Map(
  SPECIAL_TYPES.filter((special) => special !== "DateTime").map(
    (special) => [SPECIAL_DISPLAY[special], special] as const,
  ),
)

const isSpecialName = (name: string): name is SpecialType =>
  SPECIAL_TYPES.some((special) => special === name)

const REFERENCE_SPECIALS: ReadonlySet<SpecialType> = new Set<SpecialType>(["String", "Object", "Void"])

interface FrameworkType {
  readonly namespace: string
  readonly isValueType?: boolean
  readonly baseType?: string
}

const FRAMEWORK_TYPES: ReadonlyMap<string, FrameworkType> = new Map<string, FrameworkType>([
  ["Guid", { namespace: "System", isValueType: true }],
  ["TimeSpan", { namespace: "System", isValueType: true }],
  ["DateTimeOffset", { namespace: "System", isValueType: true }],
  ["IEnumerable", { namespace: "System.Collections.Generic" }],
  ["ICollection", { namespace: "System.Collections.Generic" }],
  ["IList", { namespace: "System.Collections.Generic" }],
  ["IReadOnlyCollection", { namespace: "System.Collections.Generic" }],
  ["IReadOnlyList", { namespace: "System.Collections.Generic" }],
  ["List", { namespace: "System.Collections.Generic" }],
  ["DbConnection", { namespace: "System.Data.Common" }],
  ["SqlConnection", { namespace: "Microsoft.Data.SqlClient", baseType: "DbConnection" }],
  ["SqliteConnection", { namespace: "Microsoft.Data.Sqlite", baseType: "DbConnection" }],
  ["NpgsqlConnection", { namespace: "Npgsql", baseType: "DbConnection" }],
  ["MySqlConnection", { namespace: "MySqlConnector", baseType: "DbConnection" }],
  ["DbContext", { namespace: "Microsoft.EntityFrameworkCore" }],
  ["DbSet", { namespace: "Microsoft.EntityFrameworkCore" }],
])

/**
 * `Foo.Bar.SqlProcedureAttribute` → `SqlProcedure`
 */
export const normalizeAttributeName = (name: string): string => {
  const simple = name.slice(name.lastIndexOf(".") + 1)
  return simple.endsWith("Attribute") && simple.length > "Attribute".length
    ? simple.slice(0, -"Attribute".length)
    : simple
}

const qualify = (namespace: string, name: string): string =>
  namespace === "" ? name : `${namespace}.${name}`

const lastSegment = (name: string): string => name.slice(name.lastIndexOf(".") + 1)

const withArguments = (name: string, args: readonly TypeDescriptor[]): string =>
  args.length === 0 ? name : `${name}<${args.map((a) => a.display).join(", ")}>`

// ============================================================================
// Descriptor implementation
// ============================================================================

interface DescriptorInit {
  readonly name: string
  readonly namespace: string
  readonly display: string
  readonly special?: SpecialType
  readonly typeArguments?: readonly TypeDescriptor[]
  readonly isValueType: boolean
  readonly isNullableValueType?: boolean
  readonly isNullableAnnotated?: boolean
  readonly isDeclared?: boolean
  readonly containingType?: string
  readonly elementType?: TypeDescriptor
  readonly baseType?: () => TypeDescriptor | undefined
  readonly fields?: () => readonly MemberDescriptor[]
  readonly properties?: () => readonly MemberDescriptor[]
}

class ResolvedType implements TypeDescriptor {
  readonly name: string
  readonly namespace: string
  readonly fullName: string
  readonly display: string
  readonly special: SpecialType | undefined
  readonly typeArguments: readonly TypeDescriptor[]
  readonly isValueType: boolean
  readonly isNullableValueType: boolean
  readonly isNullableAnnotated: boolean
  readonly isDeclared: boolean
  readonly containingType: string | undefined
  readonly elementType: TypeDescriptor | undefined

  private readonly init: DescriptorInit
  private resolvedBase: { readonly value: TypeDescriptor | undefined } | undefined
  private resolvedFields: readonly MemberDescriptor[] | undefined
  private resolvedProperties: readonly MemberDescriptor[] | undefined

  constructor(init: DescriptorInit) {
    this.init = init
    this.name = init.name
    this.namespace = init.namespace
    this.fullName = qualify(
      init.namespace,
      init.containingType === undefined ? init.name : `${init.containingType}.${init.name}`,
    )
    this.display = init.display
    this.special = init.special
    this.typeArguments = init.typeArguments ?? []
    this.isValueType = init.isValueType
    this.isNullableValueType = init.isNullableValueType ?? false
    this.isNullableAnnotated = init.isNullableAnnotated ?? false
    this.isDeclared = init.isDeclared ?? false
    this.containingType = init.containingType
    this.elementType = init.elementType
  }

  get baseType(): TypeDescriptor | undefined {
    if (this.resolvedBase === undefined) {
      this.resolvedBase = { value: this.init.baseType?.() }
    }
    return this.resolvedBase.value
  }

  get fields(): readonly MemberDescriptor[] {
    this.resolvedFields ??= this.init.fields?.() ?? []
    return this.resolvedFields
  }

  get properties(): readonly MemberDescriptor[] {
    this.resolvedProperties ??= this.init.properties?.() ?? []
    return this.resolvedProperties
  }

  /** Same type with a `?` annotation (reference types only) */
  annotated(): ResolvedType {
    if (this.isNullableAnnotated || this.isValueType) return this
    return new ResolvedType({
      ...this.init,
      display: `${this.display}?`,
      isNullableAnnotated: true,
    })
  }
}

const specialType = (special: SpecialType): ResolvedType =>
  new ResolvedType({
    name: special,
    namespace: "System",
    display: SPECIAL_DISPLAY[special],
    special,
    isValueType: !REFERENCE_SPECIALS.has(special),
  })

const arrayOf = (element: TypeDescriptor, rank: number): ResolvedType =>
  new ResolvedType({
    name: `${element.name}${rankSpecifier(rank)}`,
    namespace: element.namespace,
    display: `${element.display}${rankSpecifier(rank)}`,
    isValueType: false,
    elementType: element,
  })

const nullableOf = (inner: TypeDescriptor): ResolvedType =>
  new ResolvedType({
    name: "Nullable",
    namespace: "System",
    display: `${inner.display}?`,
    typeArguments: [inner],
    isValueType: true,
    isNullableValueType: true,
  })

// ============================================================================
// Compilation builder
// ============================================================================

interface TypeEntry {
  readonly fullName: string
  readonly name: string
  readonly namespace: string
  readonly containingType: string | undefined
  readonly parts: TypeDeclaration[]
}

/**
 * Collect every type expression string in a manifest with a description of
 * where it appears (for error messages).
 */
function collectTypeStrings(manifest: Manifest): Array<readonly [string, string]> {
  const out: Array<readonly [string, string]> = []
  const members = (owner: string, kind: string, list: readonly MemberDeclaration[]) =>
    list.forEach((m) => out.push([m.type, `${kind} ${owner}.${m.name}`]))

  for (const decl of manifest.types) {
    const owner = qualify(decl.namespace, decl.name)
    if (decl.baseType !== undefined) out.push([decl.baseType, `base type of ${owner}`])
    members(owner, "field", decl.fields)
    members(owner, "property", decl.properties)
    for (const method of decl.methods) {
      out.push([method.returnType, `return type of ${owner}.${method.name}`])
      method.parameters.forEach((p) =>
        out.push([p.type, `parameter ${p.name} of ${owner}.${method.name}`]),
      )
    }
  }
  return out
}

/**
 * Build a compilation from a decoded manifest.
 *
 * Fails with the first type expression that does not parse.
 */
export function makeCompilation(
  manifest: Manifest,
  options: { readonly additionalAttributes?: readonly string[] } = {},
): Either.Either<Compilation, TypeExpressionInvalid> {
  const parsed = new Map<string, TypeExpression>()
  for (const [text, where] of collectTypeStrings(manifest)) {
    if (parsed.has(text)) continue
    const result = parseTypeExpression(text)
    if (Either.isLeft(result)) {
      return Either.left(
        new TypeExpressionInvalid({
          message: `${result.left.message} (${where})`,
          expression: result.left.expression,
          position: result.left.position,
        }),
      )
    }
    parsed.set(text, result.right)
  }

  // Merge partial declarations by qualified name, keeping first-appearance order
  const entries = new Map<string, TypeEntry>()
  for (const decl of manifest.types) {
    const local = decl.containingType === undefined ? decl.name : `${decl.containingType}.${decl.name}`
    const fullName = qualify(decl.namespace, local)
    const existing = entries.get(fullName)
    if (existing !== undefined) {
      existing.parts.push(decl)
    } else {
      entries.set(fullName, {
        fullName,
        name: decl.name,
        namespace: decl.namespace,
        containingType: decl.containingType,
        parts: [decl],
      })
    }
  }

  const bySimpleName = new Map<string, string[]>()
  for (const entry of entries.values()) {
    const list = bySimpleName.get(entry.name) ?? []
    list.push(entry.fullName)
    bySimpleName.set(entry.name, list)
  }

  const declared = new Map<string, ResolvedType>()

  const findDeclared = (name: string, scope: string): TypeEntry | undefined => {
    if (name.includes(".")) {
      const exact = entries.get(name)
      if (exact !== undefined) return exact
    }
    // Walk outwards from the enclosing namespace: A.B → A → global
    let namespace = scope
    for (;;) {
      const hit = entries.get(qualify(namespace, name))
      if (hit !== undefined) return hit
      if (namespace === "") break
      const dot = namespace.lastIndexOf(".")
      namespace = dot === -1 ? "" : namespace.slice(0, dot)
    }
    const candidates = bySimpleName.get(name)
    if (candidates !== undefined && candidates.length === 1 && candidates[0] !== undefined) {
      return entries.get(candidates[0])
    }
    return undefined
  }

  const expressionOf = (text: string): TypeExpression =>
    parsed.get(text) ?? { name: text, typeArguments: [], nullable: false }

  const toMembers =
    (list: readonly MemberDeclaration[], scope: string) => (): readonly MemberDescriptor[] =>
      list.map((m, ordinal) => ({
        name: m.name,
        type: resolve(expressionOf(m.type), scope),
        ordinal,
      }))

  const declaredType = (entry: TypeEntry): ResolvedType => {
    const cached = declared.get(entry.fullName)
    if (cached !== undefined) return cached
    const baseTypeText = entry.parts.find((p) => p.baseType !== undefined)?.baseType
    const isValueType = entry.parts.some((p) => p.kind === "struct")
    const type = new ResolvedType({
      name: entry.name,
      namespace: entry.namespace,
      display: entry.fullName,
      isValueType,
      isDeclared: true,
      ...(entry.containingType !== undefined ? { containingType: entry.containingType } : {}),
      baseType: () =>
        baseTypeText === undefined ? undefined : resolve(expressionOf(baseTypeText), entry.namespace),
      fields: toMembers(
        entry.parts.flatMap((p) => p.fields),
        entry.namespace,
      ),
      properties: toMembers(
        entry.parts.flatMap((p) => p.properties),
        entry.namespace,
      ),
    })
    declared.set(entry.fullName, type)
    return type
  }

  const frameworkType = (
    written: string,
    info: FrameworkType,
    args: readonly TypeDescriptor[],
  ): ResolvedType => {
    const base = info.baseType
    return new ResolvedType({
      name: lastSegment(written),
      namespace: info.namespace,
      display: withArguments(written, args),
      typeArguments: args,
      isValueType: info.isValueType ?? false,
      ...(base !== undefined ? { baseType: () => resolveNamed(base, [], "") } : {}),
    })
  }

  const resolveNamed = (
    name: string,
    args: readonly ResolvedType[],
    scope: string,
  ): ResolvedType => {
    const simple = lastSegment(name)
    const systemQualified = name === simple || name === `System.${simple}`

    if (args.length === 0) {
      const keyword = KEYWORDS.get(name)
      if (keyword !== undefined) return specialType(keyword)
      if (systemQualified && isSpecialName(simple)) return specialType(simple)
    }

    if (args.length === 1 && systemQualified && simple === "Nullable" && args[0] !== undefined) {
      const inner = args[0]
      return inner.isValueType ? nullableOf(inner) : inner.annotated()
    }

    const entry = findDeclared(name, scope)
    if (entry !== undefined) {
      const type = declaredType(entry)
      if (args.length === 0) return type
      return new ResolvedType({
        ...descriptorInitOf(type),
        display: withArguments(type.display, args),
        typeArguments: args,
      })
    }

    const framework = FRAMEWORK_TYPES.get(simple)
    if (framework !== undefined) return frameworkType(name, framework, args)

    const dot = name.lastIndexOf(".")
    return new ResolvedType({
      name: simple,
      namespace: dot === -1 ? "" : name.slice(0, dot),
      display: withArguments(name, args),
      typeArguments: args,
      isValueType: false,
    })
  }

  const resolve = (expression: TypeExpression, scope: string): ResolvedType => {
    if (isArrayExpression(expression)) {
      const array = arrayOf(resolve(expression.element, scope), expression.rank)
      return expression.nullable ? array.annotated() : array
    }
    const args = expression.typeArguments.map((a) => resolve(a, scope))
    const core = resolveNamed(expression.name, args, scope)
    if (!expression.nullable || core.isNullableValueType) return core
    return core.isValueType ? nullableOf(core) : core.annotated()
  }

  const types: DeclaredType[] = [...entries.values()].map((entry) => ({
    type: declaredType(entry),
    kind: entry.parts[0]?.kind ?? "class",
    methods: entry.parts.flatMap((part) =>
      part.methods.map(
        (method): MethodSymbol => ({
          name: method.name,
          accessibility: method.accessibility,
          returnType: resolve(expressionOf(method.returnType), entry.namespace),
          parameters: method.parameters.map((p, ordinal) => ({
            name: p.name,
            type: resolve(expressionOf(p.type), entry.namespace),
            modifier: p.modifier,
            attributes: p.attributes,
            ordinal,
          })),
          attributes: method.attributes,
        }),
      ),
    ),
  }))

  const attributes = new Set(
    [...manifest.attributes, ...(options.additionalAttributes ?? [])].map(normalizeAttributeName),
  )

  return Either.right({
    nullableContext: manifest.nullable,
    types,
    hasAttribute: (name) => attributes.has(normalizeAttributeName(name)),
    resolveType: (text, scope = "") =>
      Either.map(parseTypeExpression(text), (expression) => resolve(expression, scope)),
  })
}

/**
 * Recover constructor input from an existing descriptor so a variant
 * (annotated, with type arguments) can share its lazy members.
 */
function descriptorInitOf(type: TypeDescriptor): DescriptorInit {
  return {
    name: type.name,
    namespace: type.namespace,
    display: type.display,
    ...(type.special !== undefined ? { special: type.special } : {}),
    typeArguments: type.typeArguments,
    isValueType: type.isValueType,
    isNullableValueType: type.isNullableValueType,
    isNullableAnnotated: type.isNullableAnnotated,
    isDeclared: type.isDeclared,
    ...(type.containingType !== undefined ? { containingType: type.containingType } : {}),
    ...(type.elementType !== undefined ? { elementType: type.elementType } : {}),
    baseType: () => type.baseType,
    fields: () => type.fields,
    properties: () => type.properties,
  }
}
