/**
 * Parameter Binder
 *
 * Plans one DbParameter per bound method parameter (declaration order, raw
 * command parameters excluded) and renders their construction.
 */
import { Either } from "effect"
import type { UnsupportedType } from "../errors.js"
import type { CodeBuilder } from "../lib/code-builder.js"
import type { NullableContext } from "../ir/manifest.js"
import type { CoreInflection } from "../services/inflection.js"
import { canHaveNullValue, getDbType, inDeclaration, type DbTypeTag } from "./classify.js"
import { boundParameters, type ParameterDirection, type ParameterSpec, type ProcedureBinding } from "./signature.js"

/** Marker character in front of every bound parameter name */
export const PARAMETER_PREFIX = "@"

/** Name of the generated `DbParameter[]` local */
export const PARAMETERS_VARIABLE = "parameters"

export interface BoundParameter {
  readonly spec: ParameterSpec
  /** Local holding the DbParameter: `clientIdParameter` */
  readonly variable: string
  /** How the method parameter is referenced in the body */
  readonly reference: string
  /** Database-facing name including the prefix: `@client_id` */
  readonly externalName: string
  /** Set for Out and InOut parameters */
  readonly dbType: DbTypeTag | undefined
  /** Value assignment needs a `DBNull.Value` guard */
  readonly nullable: boolean
}

export interface BinderContext {
  readonly inflection: CoreInflection
  readonly nullable: NullableContext
}

export const isOutput = (direction: ParameterDirection): boolean =>
  direction === "Out" || direction === "InOut"

export const isInput = (direction: ParameterDirection): boolean =>
  direction === "In" || direction === "InOut"

const bareName = (identifier: string): string => identifier.replace(/^@/, "")

/**
 * Plan the bound parameters of a binding.
 *
 * Fails with UnsupportedType when an Out or InOut parameter has no
 * `DbType` mapping.
 */
export function planParameters(
  binding: ProcedureBinding,
  context: BinderContext,
): Either.Either<readonly BoundParameter[], UnsupportedType> {
  return Either.all(
    boundParameters(binding).map((spec) => {
      const dbType: Either.Either<DbTypeTag | undefined, UnsupportedType> = isOutput(spec.direction)
        ? Either.mapLeft(getDbType(spec.declaredType), (error) =>
            inDeclaration(error, binding.name, spec.internalName),
          )
        : Either.right(undefined)
      return Either.map(
        dbType,
        (tag): BoundParameter => ({
          spec,
          variable: `${bareName(spec.internalName)}Parameter`,
          reference: context.inflection.safeIdentifier(bareName(spec.internalName)),
          externalName: PARAMETER_PREFIX + context.inflection.parameterName(spec.internalName),
          dbType: tag,
          nullable: canHaveNullValue(spec.declaredType, context.nullable),
        }),
      )
    }),
  )
}

export const directionFlag = (direction: ParameterDirection): string | undefined => {
  switch (direction) {
    case "In":
      return undefined
    case "Out":
      return "System.Data.ParameterDirection.Output"
    case "InOut":
      return "System.Data.ParameterDirection.InputOutput"
  }
}

/**
 * Render parameter construction followed by the `DbParameter[]` array.
 * Renders nothing when there are no bound parameters.
 */
export function emitParameters(code: CodeBuilder, parameters: readonly BoundParameter[]): void {
  if (parameters.length === 0) return

  for (const p of parameters) {
    code.line(`var ${p.variable} = command.CreateParameter();`)
    code.line(`${p.variable}.ParameterName = "${p.externalName}";`)
    const direction = directionFlag(p.spec.direction)
    if (p.dbType !== undefined && direction !== undefined) {
      code.line(`${p.variable}.DbType = System.Data.DbType.${p.dbType};`)
      code.line(`${p.variable}.Direction = ${direction};`)
    }
    if (isInput(p.spec.direction)) {
      code.line(
        p.nullable
          ? `${p.variable}.Value = ${p.reference} == null ? (object)DBNull.Value : ${p.reference};`
          : `${p.variable}.Value = ${p.reference};`,
      )
    }
    code.blank()
  }

  code.block(
    `var ${PARAMETERS_VARIABLE} = new DbParameter[]`,
    (list) => parameters.forEach((p) => list.line(`${p.variable},`)),
    ";",
  )
  code.blank()
}
