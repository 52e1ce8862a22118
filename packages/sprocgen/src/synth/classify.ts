/**
 * Type Classifier
 *
 * Maps declared types onto the handful of shapes the materializer knows how
 * to produce, and primitive kinds onto ADO.NET `DbType` tags.
 *
 * Classification is a pure function of the type: the same descriptor always
 * yields the same classification.
 */
import { Either } from "effect"
import { UnsupportedType } from "../errors.js"
import type { NullableContext } from "../ir/manifest.js"
import type { SpecialType, TypeDescriptor } from "../ir/type-descriptor.js"

/**
 * Primitive kinds with a database mapping.
 */
export type ScalarKind = Exclude<SpecialType, "Char" | "Object" | "Void">

/**
 * `System.Data.DbType` member for every scalar kind.
 */
export const DbTypeTag = {
  String: "String",
  Boolean: "Boolean",
  Byte: "Byte",
  SByte: "SByte",
  Int16: "Int16",
  UInt16: "UInt16",
  Int32: "Int32",
  UInt32: "UInt32",
  Int64: "Int64",
  UInt64: "UInt64",
  Single: "Single",
  Double: "Double",
  Decimal: "Decimal",
  DateTime: "DateTime2",
} as const satisfies Record<ScalarKind, string>

export type DbTypeTag = (typeof DbTypeTag)[ScalarKind]

/**
 * Resolve the scalar kind of a special type.
 * The switch is exhaustive; the unmapped arms are explicit.
 */
export function scalarKindOf(special: SpecialType): ScalarKind | undefined {
  switch (special) {
    case "String":
    case "Boolean":
    case "Byte":
    case "SByte":
    case "Int16":
    case "UInt16":
    case "Int32":
    case "UInt32":
    case "Int64":
    case "UInt64":
    case "Single":
    case "Double":
    case "Decimal":
    case "DateTime":
      return special
    case "Char":
    case "Object":
    case "Void":
      return undefined
  }
}

export type TypeClassification =
  | {
      readonly kind: "Scalar"
      readonly type: TypeDescriptor
      /** The type with any `Nullable<T>` / `?` removed */
      readonly underlyingType: TypeDescriptor
      readonly isNullable: boolean
      readonly scalar: ScalarKind
    }
  | {
      readonly kind: "EntityType"
      readonly type: TypeDescriptor
      readonly underlyingType: TypeDescriptor
      readonly isNullable: boolean
    }
  | {
      readonly kind: "EntityCollection"
      readonly type: TypeDescriptor
      /** The item type of the collection */
      readonly underlyingType: TypeDescriptor
      readonly isNullable: boolean
    }
  | {
      readonly kind: "Void"
      readonly type: TypeDescriptor
      readonly underlyingType: TypeDescriptor
      readonly isNullable: false
    }

export type ClassificationKind = TypeClassification["kind"]

/**
 * Strip `Nullable<T>` or a `?` annotation.
 */
export function unwrapNullable(type: TypeDescriptor): {
  readonly type: TypeDescriptor
  readonly isNullable: boolean
} {
  const inner = type.typeArguments[0]
  if (type.isNullableValueType && inner !== undefined) {
    return { type: unwrapNullable(inner).type, isNullable: true }
  }
  if (type.isNullableAnnotated) {
    return { type: withoutAnnotation(type), isNullable: true }
  }
  return { type, isNullable: false }
}

/**
 * The same reference type without its `?` annotation.
 */
export function withoutAnnotation(type: TypeDescriptor): TypeDescriptor {
  if (!type.isNullableAnnotated) return type
  const display = type.display.endsWith("?") ? type.display.slice(0, -1) : type.display
  return {
    name: type.name,
    namespace: type.namespace,
    fullName: type.fullName,
    display,
    special: type.special,
    typeArguments: type.typeArguments,
    isValueType: type.isValueType,
    isNullableValueType: type.isNullableValueType,
    isNullableAnnotated: false,
    isDeclared: type.isDeclared,
    containingType: type.containingType,
    elementType: type.elementType,
    get baseType() {
      return type.baseType
    },
    get fields() {
      return type.fields
    },
    get properties() {
      return type.properties
    },
  }
}

/**
 * The "underlying" type used for list-vs-single dispatch: the single type
 * argument of a generic type, otherwise the type itself.
 */
export const getUnderlyingType = (type: TypeDescriptor): TypeDescriptor => {
  const inner = type.typeArguments[0]
  return type.typeArguments.length === 1 && inner !== undefined ? inner : type
}

/**
 * Scalar kind of a (possibly nullable) type, if it has one.
 */
export const scalarKind = (type: TypeDescriptor): ScalarKind | undefined => {
  const { type: plain } = unwrapNullable(type)
  return plain.special === undefined ? undefined : scalarKindOf(plain.special)
}

export const isScalarType = (type: TypeDescriptor): boolean => scalarKind(type) !== undefined

const unsupported = (type: TypeDescriptor, reason: string) =>
  new UnsupportedType({
    message: `Type '${type.display}' ${reason}`,
    type: type.display,
  })

/**
 * Attach the declaration a type failure came from.
 */
export const inDeclaration = (
  error: UnsupportedType,
  method: string,
  parameter?: string,
): UnsupportedType =>
  new UnsupportedType({
    message: `${error.message} (${parameter === undefined ? "return type" : `parameter '${parameter}'`} of method '${method}')`,
    type: error.type,
    method,
    ...(parameter !== undefined ? { parameter } : {}),
  })

/**
 * Classify a declared type.
 *
 * Fails for primitives outside the mapped set (`char`, `object`), for
 * arrays and for collections of scalar values.
 */
export function classifyType(
  type: TypeDescriptor,
): Either.Either<TypeClassification, UnsupportedType> {
  if (type.special === "Void") {
    return Either.right({ kind: "Void", type, underlyingType: type, isNullable: false })
  }

  const { type: plain, isNullable } = unwrapNullable(type)

  if (plain.special !== undefined) {
    const scalar = scalarKindOf(plain.special)
    return scalar === undefined
      ? Either.left(unsupported(type, "has no database type mapping"))
      : Either.right({ kind: "Scalar", type, underlyingType: plain, isNullable, scalar })
  }

  if (plain.elementType !== undefined) {
    return Either.left(unsupported(type, "is an array, which cannot be materialized"))
  }

  const item = getUnderlyingType(plain)
  if (item !== plain) {
    if (isScalarType(item)) {
      return Either.left(unsupported(type, "is a collection of scalar values, which cannot be materialized"))
    }
    return Either.right({ kind: "EntityCollection", type, underlyingType: item, isNullable })
  }

  return Either.right({ kind: "EntityType", type, underlyingType: plain, isNullable })
}

/**
 * Resolve the `System.Data.DbType` tag for a type.
 *
 * Fails with UnsupportedType when the type has no scalar mapping.
 */
export function getDbType(type: TypeDescriptor): Either.Either<DbTypeTag, UnsupportedType> {
  const scalar = scalarKind(type)
  return scalar === undefined
    ? Either.left(unsupported(type, "has no database type mapping"))
    : Either.right(DbTypeTag[scalar])
}

/**
 * Whether a value of `type` may be null under the nullable context.
 *
 * - `Nullable<T>` always can
 * - other value types never can
 * - reference types always can with nullable reference types disabled,
 *   otherwise only when annotated with `?`
 */
export function canHaveNullValue(type: TypeDescriptor, nullable: NullableContext): boolean {
  if (type.isNullableValueType) return true
  if (type.isValueType) return false
  return nullable === "disable" || type.isNullableAnnotated
}
