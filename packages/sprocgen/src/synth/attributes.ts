/**
 * Marker attribute source
 *
 * The attribute classes the generator looks for, emitted alongside the
 * generated units so projects need not declare them.
 */
import { normalizeAttributeName } from "../ir/compilation.js"
import { CodeBuilder } from "../lib/code-builder.js"
import { headerLines, type GeneratedUnit } from "./emit.js"
import type { MarkerNames } from "./signature.js"

export const attributeClassName = (marker: string): string => `${normalizeAttributeName(marker)}Attribute`

export const attributesFileName = (markers: MarkerNames): string =>
  `${attributeClassName(markers.method)}.g.cs`

export function emitAttributeSource(markers: MarkerNames, banner: string): GeneratedUnit {
  const method = attributeClassName(markers.method)
  const rawCommand = attributeClassName(markers.rawCommand)

  const code = new CodeBuilder()
  code.lines(headerLines(banner))
  code.line("#nullable disable")
  code.blank()
  code.line("[System.AttributeUsage(System.AttributeTargets.Method, AllowMultiple = false)]")
  code.block(`internal sealed class ${method} : System.Attribute`, (body) => {
    body.block(`public ${method}()`, () => {})
    body.blank()
    body.block(`public ${method}(string name)`, (ctor) => ctor.line("this.ProcedureName = name;"))
    body.blank()
    body.line("public string ProcedureName { get; }")
    body.blank()
    body.line("public string EntitySet { get; set; }")
  })
  code.blank()
  code.line("[System.AttributeUsage(System.AttributeTargets.Parameter, AllowMultiple = false)]")
  code.block(`internal sealed class ${rawCommand} : System.Attribute`, () => {})

  return {
    fileName: attributesFileName(markers),
    typeName: "",
    methods: [],
    content: code.toString(),
  }
}
