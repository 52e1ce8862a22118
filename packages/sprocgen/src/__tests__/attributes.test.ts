import { describe, it, expect } from "@effect/vitest"
import { attributeClassName, attributesFileName, emitAttributeSource } from "../synth/attributes.js"
import { DEFAULT_MARKERS } from "../synth/signature.js"

describe("emitAttributeSource", () => {
  it("declares both marker attributes", () => {
    const unit = emitAttributeSource(DEFAULT_MARKERS, "sprocgen")
    expect(unit.fileName).toBe("SqlProcedureAttribute.g.cs")
    expect(unit.typeName).toBe("")
    expect(unit.methods).toEqual([])
    expect(unit.content.split("\n")).toEqual([
      "// <auto-generated>",
      "// Code generated by sprocgen.",
      "// Changes may cause incorrect behavior and will be lost if the code is",
      "// regenerated.",
      "// </auto-generated>",
      "#nullable disable",
      "",
      "[System.AttributeUsage(System.AttributeTargets.Method, AllowMultiple = false)]",
      "internal sealed class SqlProcedureAttribute : System.Attribute",
      "{",
      "    public SqlProcedureAttribute()",
      "    {",
      "    }",
      "",
      "    public SqlProcedureAttribute(string name)",
      "    {",
      "        this.ProcedureName = name;",
      "    }",
      "",
      "    public string ProcedureName { get; }",
      "",
      "    public string EntitySet { get; set; }",
      "}",
      "",
      "[System.AttributeUsage(System.AttributeTargets.Parameter, AllowMultiple = false)]",
      "internal sealed class RawCommandAttribute : System.Attribute",
      "{",
      "}",
    ])
  })

  it("follows custom marker names", () => {
    const markers = { method: "Acme.ProcAttribute", rawCommand: "Sql" }
    expect(attributeClassName(markers.method)).toBe("ProcAttribute")
    expect(attributesFileName(markers)).toBe("ProcAttribute.g.cs")
    const lines = emitAttributeSource(markers, "tool").content.split("\n")
    expect(lines[1]).toBe("// Code generated by tool.")
    expect(lines[8]).toBe("internal sealed class ProcAttribute : System.Attribute")
    expect(lines[25]).toBe("internal sealed class SqlAttribute : System.Attribute")
  })
})
