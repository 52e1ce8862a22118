/**
 * Result Materializer
 *
 * Picks one execution strategy per declaration and renders it:
 *
 * | return kind              | connection     | strategy        |
 * | ------------------------ | -------------- | --------------- |
 * | Scalar                   | any            | Scalar          |
 * | Void                     | any            | NonQuery        |
 * | EntityType / Collection  | FoundContext   | EntityFramework |
 * | EntityType / Collection  | Found, Assumed | Manual          |
 *
 * Out and InOut parameters are read back after execution with the same
 * DBNull conversion that row mapping uses.
 */
import type { CodeBuilder } from "../lib/code-builder.js"
import type { NullableContext } from "../ir/manifest.js"
import type { TypeDescriptor } from "../ir/type-descriptor.js"
import type { CoreInflection } from "../services/inflection.js"
import { canHaveNullValue, unwrapNullable, type TypeClassification } from "./classify.js"
import {
  closeConnectionStatement,
  openConnectionStatement,
  requiresExplicitOpenClose,
  type ConnectionStrategy,
} from "./connection.js"
import { isOutput, PARAMETERS_VARIABLE, type BoundParameter } from "./parameters.js"
import type { ProcedureBinding } from "./signature.js"

/** The database null sentinel every conversion compares against */
export const DB_NULL = "DBNull.Value"

type ScalarClassification = Extract<TypeClassification, { readonly kind: "Scalar" }>
type EntityClassification = Extract<TypeClassification, { readonly kind: "EntityType" | "EntityCollection" }>

export type ExecutionStrategy =
  | { readonly _tag: "Scalar"; readonly classification: ScalarClassification }
  | { readonly _tag: "NonQuery" }
  | { readonly _tag: "Manual"; readonly classification: EntityClassification }
  | {
      readonly _tag: "EntityFramework"
      readonly classification: EntityClassification
      readonly context: string
      readonly entitySet: string
    }

/**
 * Find the DbSet accessor for `itemType` on a context type: a property typed
 * `DbSet<Item>`, else the inflected type name.
 */
export function resolveEntitySet(
  contextType: TypeDescriptor,
  itemType: TypeDescriptor,
  inflection: CoreInflection,
): string {
  const match = contextType.properties.find((property) => {
    const type = unwrapNullable(property.type).type
    const argument = type.typeArguments[0]
    return (
      type.name === "DbSet" &&
      type.typeArguments.length === 1 &&
      argument !== undefined &&
      argument.name === itemType.name
    )
  })
  return match?.name ?? inflection.entitySetName(itemType.name)
}

export function selectStrategy(
  binding: ProcedureBinding,
  classification: TypeClassification,
  connection: ConnectionStrategy,
  inflection: CoreInflection,
): ExecutionStrategy {
  switch (classification.kind) {
    case "Scalar":
      return { _tag: "Scalar", classification }
    case "Void":
      return { _tag: "NonQuery" }
    case "EntityType":
    case "EntityCollection": {
      if (connection._tag !== "FoundContext") return { _tag: "Manual", classification }
      const entitySet =
        binding.overrides.EntitySet ??
        resolveEntitySet(connection.contextType, classification.underlyingType, inflection)
      return { _tag: "EntityFramework", classification, context: connection.field, entitySet }
    }
  }
}

/**
 * Convert a raw database value to `type`, mapping DBNull to null when the
 * type can hold null. With `orNull`, a plain `null` is mapped the same way
 * (`ExecuteScalar` returns null for an empty result set).
 */
export function convertFromDb(
  expression: string,
  type: TypeDescriptor,
  nullable: NullableContext,
  options: { readonly orNull?: boolean } = {},
): string {
  if (!canHaveNullValue(type, nullable)) return `(${type.display})${expression}`
  const plain = unwrapNullable(type).type
  const test = options.orNull === true
    ? `${expression} == null || ${expression} == ${DB_NULL}`
    : `${expression} == ${DB_NULL}`
  return `${test} ? (${type.display})null : (${plain.display})${expression}`
}

/**
 * How `type` is named from code inside `namespace`.
 */
export function typeReference(type: TypeDescriptor, namespace: string): string {
  const local = type.containingType === undefined ? type.name : `${type.containingType}.${type.name}`
  return type.namespace === namespace || type.namespace === "" ? local : type.fullName
}

export interface MaterializeContext {
  readonly binding: ProcedureBinding
  readonly parameters: readonly BoundParameter[]
  readonly connection: ConnectionStrategy
  readonly nullable: NullableContext
  /** Namespace of the generated unit */
  readonly namespace: string
  /** Expression evaluating to the command text */
  readonly commandText: string
}

/**
 * Assign Out and InOut values back to the method parameters.
 */
export function emitOutputReadBack(
  code: CodeBuilder,
  parameters: readonly BoundParameter[],
  nullable: NullableContext,
): void {
  for (const p of parameters) {
    if (!isOutput(p.spec.direction)) continue
    code.line(`${p.reference} = ${convertFromDb(`${p.variable}.Value`, p.spec.declaredType, nullable)};`)
  }
}

const emitCommandSetup = (code: CodeBuilder, context: MaterializeContext): void => {
  code.line(`command.CommandText = ${context.commandText};`)
  if (context.parameters.length > 0) {
    code.line(`command.Parameters.AddRange(${PARAMETERS_VARIABLE});`)
  }
}

/**
 * Wrap `body` in open / try / finally close when the connection strategy
 * requires it.
 */
const withOpenConnection = (
  code: CodeBuilder,
  connection: ConnectionStrategy,
  body: (code: CodeBuilder) => void,
): void => {
  if (!requiresExplicitOpenClose(connection)) {
    body(code)
    return
  }
  code.line(openConnectionStatement(connection))
  code.block("try", body)
  code.block("finally", (cleanup) => cleanup.line(closeConnectionStatement(connection)))
}

const emitScalar = (
  code: CodeBuilder,
  classification: ScalarClassification,
  context: MaterializeContext,
): void => {
  emitCommandSetup(code, context)
  withOpenConnection(code, context.connection, (body) => {
    body.line("var result = command.ExecuteScalar();")
    emitOutputReadBack(body, context.parameters, context.nullable)
    body.line(`return ${convertFromDb("result", classification.type, context.nullable, { orNull: true })};`)
  })
}

const emitNonQuery = (code: CodeBuilder, context: MaterializeContext): void => {
  emitCommandSetup(code, context)
  withOpenConnection(code, context.connection, (body) => {
    body.line("command.ExecuteNonQuery();")
    emitOutputReadBack(body, context.parameters, context.nullable)
  })
}

/**
 * Read the current row positionally into a fresh `item`.
 * Column i maps to the i-th declared property.
 */
const emitRowMapping = (
  code: CodeBuilder,
  itemType: TypeDescriptor,
  context: MaterializeContext,
): void => {
  code.line(`var item = new ${typeReference(itemType, context.namespace)}();`)
  for (const property of itemType.properties) {
    const value = `value_${property.ordinal}`
    code.line(`var ${value} = reader.GetValue(${property.ordinal});`)
    code.line(`item.${property.name} = ${convertFromDb(value, property.type, context.nullable)};`)
  }
}

const emitManual = (
  code: CodeBuilder,
  classification: EntityClassification,
  context: MaterializeContext,
): void => {
  const itemType = classification.underlyingType
  const itemName = typeReference(itemType, context.namespace)

  emitCommandSetup(code, context)
  code.line("using var reader = command.ExecuteReader();")
  if (classification.kind === "EntityCollection") {
    code.line(`var result = new List<${itemName}>();`)
    code.block("while (reader.Read())", (row) => {
      emitRowMapping(row, itemType, context)
      row.line("result.Add(item);")
    })
  } else {
    // A non-nullable struct has no null to start from
    code.line(
      itemType.isValueType && !classification.isNullable
        ? `${itemName} result = default;`
        : `${itemName}? result = null;`,
    )
    code.block("if (reader.Read())", (row) => {
      emitRowMapping(row, itemType, context)
      row.line("result = item;")
    })
  }
  code.blank()
  code.line("reader.Close();")
  emitOutputReadBack(code, context.parameters, context.nullable)
  code.line("return result;")
}

const emitEntityFramework = (
  code: CodeBuilder,
  strategy: Extract<ExecutionStrategy, { readonly _tag: "EntityFramework" }>,
  context: MaterializeContext,
): void => {
  const args =
    context.parameters.length > 0 ? `${context.commandText}, ${PARAMETERS_VARIABLE}` : context.commandText
  const terminal =
    strategy.classification.kind === "EntityCollection" ? "ToList()" : "AsEnumerable().FirstOrDefault()"
  code.line(`var result = this.${strategy.context}.${strategy.entitySet}.FromSqlRaw(${args}).${terminal};`)
  emitOutputReadBack(code, context.parameters, context.nullable)
  code.line("return result;")
}

/**
 * Render execution, output read-back and the return statement.
 */
export function emitExecution(
  code: CodeBuilder,
  strategy: ExecutionStrategy,
  context: MaterializeContext,
): void {
  switch (strategy._tag) {
    case "Scalar":
      return emitScalar(code, strategy.classification, context)
    case "NonQuery":
      return emitNonQuery(code, context)
    case "Manual":
      return emitManual(code, strategy.classification, context)
    case "EntityFramework":
      return emitEntityFramework(code, strategy, context)
  }
}
