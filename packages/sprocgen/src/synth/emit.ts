/**
 * Unit Emitter
 *
 * Plans each marked method (classification, parameters, command text,
 * execution strategy) and assembles one partial-type source unit per
 * enclosing type.
 */
import { Either } from "effect"
import type { UnsupportedType } from "../errors.js"
import type { DeclaredType } from "../ir/compilation.js"
import type { NullableContext } from "../ir/manifest.js"
import { CodeBuilder } from "../lib/code-builder.js"
import type { CoreInflection } from "../services/inflection.js"
import { classifyType, inDeclaration } from "./classify.js"
import { buildCommandText, emitCommandText, type CommandText } from "./command-text.js"
import { accessExpression, usesEntityFramework, type ConnectionStrategy } from "./connection.js"
import { emitExecution, selectStrategy, type ExecutionStrategy } from "./materialize.js"
import { emitParameters, planParameters, type BoundParameter } from "./parameters.js"
import type { ParameterSpec, ProcedureBinding } from "./signature.js"

export const DEFAULT_BANNER = "sprocgen"

const BASE_USINGS = ["System", "System.Collections.Generic", "System.Data.Common", "System.Linq"]
const ENTITY_FRAMEWORK_USING = "Microsoft.EntityFrameworkCore"

export interface GeneratedUnit {
  /** Output file name, e.g. `Foo_C.g.cs` */
  readonly fileName: string
  /** Fully qualified name of the enclosing type; empty for support sources */
  readonly typeName: string
  /** Generated method names, in declaration order */
  readonly methods: readonly string[]
  readonly content: string
}

export interface MethodPlan {
  readonly binding: ProcedureBinding
  readonly parameters: readonly BoundParameter[]
  readonly commandText: CommandText
  readonly execution: ExecutionStrategy
}

export interface EmitContext {
  readonly inflection: CoreInflection
  readonly nullable: NullableContext
  readonly connection: ConnectionStrategy
  /** Tool name written into the header */
  readonly banner: string
}

/** `Foo.Bar.C` → `Foo_Bar_C.g.cs` */
export const unitFileName = (fullName: string): string => `${fullName.replace(/\./g, "_")}.g.cs`

export const headerLines = (banner: string): readonly string[] => [
  "// <auto-generated>",
  `// Code generated by ${banner}.`,
  "// Changes may cause incorrect behavior and will be lost if the code is",
  "// regenerated.",
  "// </auto-generated>",
]

/**
 * Plan one method. Fails when its return type or an output parameter type
 * cannot be mapped.
 */
export function planMethod(
  binding: ProcedureBinding,
  context: EmitContext,
): Either.Either<MethodPlan, UnsupportedType> {
  return Either.gen(function* () {
    const classification = yield* Either.mapLeft(classifyType(binding.returnType), (error) =>
      inDeclaration(error, binding.name),
    )
    const parameters = yield* planParameters(binding, context)
    return {
      binding,
      parameters,
      commandText: buildCommandText(binding, parameters, context.inflection),
      execution: selectStrategy(binding, classification, context.connection, context.inflection),
    }
  })
}

const modifierPrefix = (spec: ParameterSpec): string => {
  switch (spec.direction) {
    case "In":
      return ""
    case "Out":
      return "out "
    case "InOut":
      return "ref "
  }
}

export function methodSignature(binding: ProcedureBinding, inflection: CoreInflection): string {
  const parameters = binding.parameters
    .map((p) => `${modifierPrefix(p)}${p.declaredType.display} ${inflection.safeIdentifier(p.internalName.replace(/^@/, ""))}`)
    .join(", ")
  return `${binding.visibility} partial ${binding.returnType.display} ${binding.name}(${parameters})`
}

/**
 * Render a full method: signature, connection and command locals, bound
 * parameters, command text and execution.
 */
export function emitMethod(code: CodeBuilder, plan: MethodPlan, context: EmitContext, namespace: string): void {
  code.block(methodSignature(plan.binding, context.inflection), (body) => {
    body.line(`var connection = ${accessExpression(context.connection)};`)
    body.line("using var command = connection.CreateCommand();")
    body.blank()
    emitParameters(body, plan.parameters)
    const commandText = emitCommandText(body, plan.commandText)
    emitExecution(body, plan.execution, {
      binding: plan.binding,
      parameters: plan.parameters,
      connection: context.connection,
      nullable: context.nullable,
      namespace,
      commandText,
    })
  })
}

export const usingsFor = (connection: ConnectionStrategy): readonly string[] =>
  usesEntityFramework(connection) ? [...BASE_USINGS, ENTITY_FRAMEWORK_USING] : BASE_USINGS

/**
 * Assemble the source unit for one enclosing type. The namespace block is
 * omitted for types in the global namespace.
 */
export function emitUnit(
  declared: DeclaredType,
  plans: readonly MethodPlan[],
  context: EmitContext,
): GeneratedUnit {
  const { type } = declared
  const code = new CodeBuilder()
  code.lines(headerLines(context.banner))
  code.line("#nullable enable")
  code.line("#pragma warning disable 1591")
  code.blank()

  const body = (inner: CodeBuilder) => {
    usingsFor(context.connection).forEach((u) => inner.line(`using ${u};`))
    inner.blank()
    inner.block(`partial ${declared.kind} ${type.name}`, (members) => {
      plans.forEach((plan, index) => {
        if (index > 0) members.blank()
        emitMethod(members, plan, context, type.namespace)
      })
    })
  }

  if (type.namespace === "") body(code)
  else code.block(`namespace ${type.namespace}`, body)

  return {
    fileName: unitFileName(type.fullName),
    typeName: type.fullName,
    methods: plans.map((p) => p.binding.name),
    content: code.toString(),
  }
}
