/**
 * TypeDescriptor - the narrow view of the host type system the synthesis
 * engine works against.
 *
 * Only what classification, connection discovery and row mapping need is
 * exposed: identity and display, the primitive kind, generic arguments,
 * nullability, the base-type chain and declared members in ordinal order.
 */

/**
 * Primitive kinds the compilation knows about.
 * `Char`, `Object` and `Void` are recognized but have no database mapping.
 */
export type SpecialType =
  | "String"
  | "Boolean"
  | "Byte"
  | "SByte"
  | "Int16"
  | "UInt16"
  | "Int32"
  | "UInt32"
  | "Int64"
  | "UInt64"
  | "Single"
  | "Double"
  | "Decimal"
  | "DateTime"
  | "Char"
  | "Object"
  | "Void"

/**
 * A field or property of a declared type.
 */
export interface MemberDescriptor {
  readonly name: string
  readonly type: TypeDescriptor
  /** Position among members of the same kind, in declaration order */
  readonly ordinal: number
}

export interface TypeDescriptor {
  /** Simple metadata name: `Int32`, `Nullable`, `IList`, `Item` */
  readonly name: string
  /** Containing namespace, empty for the global namespace */
  readonly namespace: string
  /** Namespace-qualified name without type arguments */
  readonly fullName: string
  /** How the type is written in generated signatures and casts */
  readonly display: string
  readonly special: SpecialType | undefined
  readonly typeArguments: readonly TypeDescriptor[]
  readonly isValueType: boolean
  /** `Nullable<T>`, also written `T?` for value types */
  readonly isNullableValueType: boolean
  /** Reference type written with a trailing `?` */
  readonly isNullableAnnotated: boolean
  /** Declared in the manifest (as opposed to framework or unknown types) */
  readonly isDeclared: boolean
  /** Enclosing type name for nested declarations */
  readonly containingType: string | undefined
  /** Element type of an array, undefined for every other type */
  readonly elementType: TypeDescriptor | undefined
  readonly baseType: TypeDescriptor | undefined
  readonly fields: readonly MemberDescriptor[]
  readonly properties: readonly MemberDescriptor[]
}

/**
 * Walk a type and its base types, nearest first.
 */
export function* baseTypeChain(type: TypeDescriptor): Generator<TypeDescriptor> {
  const seen = new Set<string>()
  let current: TypeDescriptor | undefined = type
  while (current !== undefined && !seen.has(current.fullName)) {
    seen.add(current.fullName)
    yield current
    current = current.baseType
  }
}

/**
 * True when `type` is `name`, or derives from it.
 */
export const isOrDerivesFrom = (type: TypeDescriptor, name: string): boolean => {
  for (const t of baseTypeChain(type)) {
    if (t.name === name) return true
  }
  return false
}

/**
 * True when a base type of `type` (not `type` itself) is `name`.
 */
export const derivesFrom = (type: TypeDescriptor, name: string): boolean =>
  type.baseType !== undefined && isOrDerivesFrom(type.baseType, name)
