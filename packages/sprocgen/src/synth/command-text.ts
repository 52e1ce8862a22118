/**
 * Command Text Builder
 *
 * Raw command parameters are passed through by reference; stored procedure
 * calls are spelled out as `name @a, @b OUTPUT`.
 */
import type { CodeBuilder } from "../lib/code-builder.js"
import type { CoreInflection } from "../services/inflection.js"
import { isOutput, type BoundParameter } from "./parameters.js"
import type { ProcedureBinding } from "./signature.js"

/** Name of the generated local holding a procedure call */
export const SQL_QUERY_VARIABLE = "sqlQuery"

export const OUTPUT_MARKER = "OUTPUT"

export type CommandText =
  /** The caller supplies the text through a method parameter */
  | { readonly _tag: "Reference"; readonly expression: string }
  /** Text synthesized from the procedure name and bound parameters */
  | { readonly _tag: "Literal"; readonly text: string }

/**
 * Build the command text for a binding.
 * Parameter references always use external names.
 */
export function buildCommandText(
  binding: ProcedureBinding,
  parameters: readonly BoundParameter[],
  inflection: CoreInflection,
): CommandText {
  const source = binding.commandSource
  switch (source._tag) {
    case "RawText":
      return {
        _tag: "Reference",
        expression: inflection.safeIdentifier(source.parameter.replace(/^@/, "")),
      }
    case "NamedProcedure": {
      if (parameters.length === 0) return { _tag: "Literal", text: source.name }
      const list = parameters
        .map((p) => (isOutput(p.spec.direction) ? `${p.externalName} ${OUTPUT_MARKER}` : p.externalName))
        .join(", ")
      return { _tag: "Literal", text: `${source.name} ${list}` }
    }
  }
}

/**
 * C# verbatim string literal: `@"..."` with `"` doubled.
 */
export const verbatimString = (text: string): string => `@"${text.replace(/"/g, '""')}"`

/**
 * Render the command text local if one is needed and return the expression
 * that evaluates to the command text.
 */
export function emitCommandText(code: CodeBuilder, commandText: CommandText): string {
  switch (commandText._tag) {
    case "Reference":
      return commandText.expression
    case "Literal":
      code.line(`var ${SQL_QUERY_VARIABLE} = ${verbatimString(commandText.text)};`)
      return SQL_QUERY_VARIABLE
  }
}
