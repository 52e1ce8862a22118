/**
 * Connection Strategy Resolver
 *
 * Decides how generated code gets hold of a live connection, once per
 * enclosing type:
 * - Found: a field typed as (or derived from) DbConnection
 * - FoundContext: a field whose type derives from DbContext
 * - AssumedDefault: neither exists; assume a context field by convention
 *
 * A connection field wins over a context field.
 */
import { Data } from "effect"
import { derivesFrom, isOrDerivesFrom, type TypeDescriptor } from "../ir/type-descriptor.js"

export const CONNECTION_TYPE_NAME = "DbConnection"
export const CONTEXT_BASE_TYPE_NAME = "DbContext"
export const DEFAULT_CONTEXT_NAME = "dbContext"

export type ConnectionStrategy = Data.TaggedEnum<{
  Found: { readonly field: string }
  FoundContext: { readonly field: string; readonly contextType: TypeDescriptor }
  AssumedDefault: { readonly name: string }
}>

export const ConnectionStrategy = Data.taggedEnum<ConnectionStrategy>()

/**
 * Scan the fields of `type` in declaration order.
 */
export function resolveConnectionStrategy(
  type: TypeDescriptor,
  defaultContextName: string = DEFAULT_CONTEXT_NAME,
): ConnectionStrategy {
  const connection = type.fields.find((f) => isOrDerivesFrom(f.type, CONNECTION_TYPE_NAME))
  if (connection !== undefined) {
    return ConnectionStrategy.Found({ field: connection.name })
  }

  const context = type.fields.find((f) => derivesFrom(f.type, CONTEXT_BASE_TYPE_NAME))
  if (context !== undefined) {
    return ConnectionStrategy.FoundContext({ field: context.name, contextType: context.type })
  }

  return ConnectionStrategy.AssumedDefault({ name: defaultContextName })
}

/**
 * Expression that evaluates to the DbConnection.
 */
export const accessExpression: (strategy: ConnectionStrategy) => string = ConnectionStrategy.$match({
  Found: ({ field }) => `this.${field}`,
  FoundContext: ({ field }) => `this.${field}.Database.GetDbConnection()`,
  AssumedDefault: ({ name }) => `this.${name}.Database.GetDbConnection()`,
})

/**
 * A connection field belongs to its owner, which opens and closes it.
 * Connections borrowed from a context are opened around scalar execution.
 */
export const requiresExplicitOpenClose = (strategy: ConnectionStrategy): boolean =>
  strategy._tag !== "Found"

/** Whether generated code touches EF Core APIs */
export const usesEntityFramework = (strategy: ConnectionStrategy): boolean =>
  strategy._tag !== "Found"

export const openConnectionStatement = (strategy: ConnectionStrategy): string =>
  ConnectionStrategy.$match(strategy, {
    Found: ({ field }) => `this.${field}.Open();`,
    FoundContext: ({ field }) => `this.${field}.Database.OpenConnection();`,
    AssumedDefault: ({ name }) => `this.${name}.Database.OpenConnection();`,
  })

export const closeConnectionStatement = (strategy: ConnectionStrategy): string =>
  ConnectionStrategy.$match(strategy, {
    Found: ({ field }) => `this.${field}.Close();`,
    FoundContext: ({ field }) => `this.${field}.Database.CloseConnection();`,
    AssumedDefault: ({ name }) => `this.${name}.Database.CloseConnection();`,
  })
