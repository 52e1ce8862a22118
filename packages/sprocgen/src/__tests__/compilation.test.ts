/**
 * Compilation model tests: name resolution, partial merging and symbol lookup.
 */
import { describe, it, expect } from "@effect/vitest"
import { Either } from "effect"
import { makeCompilation, normalizeAttributeName, type Compilation } from "../ir/compilation.js"
import { isOrDerivesFrom, derivesFrom } from "../ir/type-descriptor.js"
import { testCompilation, testManifest } from "../testing.js"

const compilation: Compilation = testCompilation({
  attributes: ["Acme.Data.SqlProcedureAttribute"],
  types: [
    { name: "Item", namespace: "Foo", properties: [{ name: "Id", type: "int" }] },
    { name: "Item", namespace: "Foo.Bar" },
    { name: "Point", namespace: "Geo", kind: "struct" },
    { name: "AppDb", namespace: "Foo", baseType: "DbContext" },
    { name: "Store", namespace: "Foo", baseType: "AppDb" },
  ],
})

const resolve = (text: string, scope?: string) => Either.getOrThrow(compilation.resolveType(text, scope))

describe("resolveType", () => {
  it("maps keywords and System names onto special types", () => {
    for (const text of ["int", "Int32", "System.Int32"]) {
      const type = resolve(text)
      expect(type.special).toBe("Int32")
      expect(type.display).toBe("int")
      expect(type.isValueType).toBe(true)
    }
    expect(resolve("DateTime").special).toBe("DateTime")
    expect(resolve("string").isValueType).toBe(false)
  })

  it("wraps value types in Nullable", () => {
    for (const text of ["int?", "Nullable<int>", "System.Nullable<Int32>"]) {
      const type = resolve(text)
      expect(type.isNullableValueType).toBe(true)
      expect(type.display).toBe("int?")
      expect(type.typeArguments[0]?.special).toBe("Int32")
    }
  })

  it("annotates reference types", () => {
    const type = resolve("string?")
    expect(type.isNullableAnnotated).toBe(true)
    expect(type.isNullableValueType).toBe(false)
    expect(type.display).toBe("string?")
  })

  it("resolves declared types from the innermost namespace outwards", () => {
    expect(resolve("Item", "Foo.Bar").fullName).toBe("Foo.Bar.Item")
    expect(resolve("Item", "Foo").fullName).toBe("Foo.Item")
    expect(resolve("Foo.Item", "Foo.Bar").fullName).toBe("Foo.Item")
  })

  it("displays declared types by full name", () => {
    expect(resolve("IList<Item>", "Foo").display).toBe("IList<Foo.Item>")
  })

  it("falls back to a unique simple name across namespaces", () => {
    expect(resolve("Point", "Elsewhere").fullName).toBe("Geo.Point")
    expect(resolve("Point", "Elsewhere").isValueType).toBe(true)
  })

  it("exposes declared members with ordinals", () => {
    expect(resolve("Item", "Foo").properties.map((p) => [p.name, p.type.display, p.ordinal])).toEqual([
      ["Id", "int", 0],
    ])
  })

  it("follows base types through framework types", () => {
    const store = resolve("Store", "Foo")
    expect(isOrDerivesFrom(store, "DbContext")).toBe(true)
    expect(derivesFrom(store, "AppDb")).toBe(true)
    expect(derivesFrom(resolve("DbContext"), "DbContext")).toBe(false)
    expect(isOrDerivesFrom(resolve("NpgsqlConnection"), "DbConnection")).toBe(true)
  })

  it("treats unknown names as opaque reference types", () => {
    const type = resolve("Vendor.Widget")
    expect(type.namespace).toBe("Vendor")
    expect(type.name).toBe("Widget")
    expect(type.isValueType).toBe(false)
    expect(type.isDeclared).toBe(false)
    expect(type.fields).toEqual([])
  })

  it("resolves arrays as reference types over their element", () => {
    const bytes = resolve("byte[]")
    expect(bytes.display).toBe("byte[]")
    expect(bytes.isValueType).toBe(false)
    expect(bytes.typeArguments).toEqual([])
    expect(bytes.special).toBeUndefined()
    expect(bytes.elementType?.special).toBe("Byte")

    const items = resolve("Item?[,]?", "Foo")
    expect(items.display).toBe("Foo.Item?[,]?")
    expect(items.isNullableAnnotated).toBe(true)
    expect(items.elementType?.fullName).toBe("Foo.Item")
    expect(items.elementType?.isNullableAnnotated).toBe(true)

    expect(resolve("int?[]").elementType?.isNullableValueType).toBe(true)
  })
})

describe("makeCompilation", () => {
  it("merges partial declarations in first-appearance order", () => {
    const merged = testCompilation({
      types: [
        { name: "A", fields: [{ name: "x", type: "int" }], methods: [{ name: "M1", returnType: "void" }] },
        { name: "B" },
        { name: "A", fields: [{ name: "y", type: "long" }], methods: [{ name: "M2", returnType: "void" }] },
      ],
    })
    expect(merged.types.map((t) => t.type.fullName)).toEqual(["A", "B"])
    expect(merged.types[0]?.methods.map((m) => m.name)).toEqual(["M1", "M2"])
    expect(merged.types[0]?.type.fields.map((f) => f.name)).toEqual(["x", "y"])
  })

  it("keeps parameter order and modifiers", () => {
    const c = testCompilation({
      types: [
        {
          name: "A",
          methods: [
            {
              name: "M",
              returnType: "void",
              parameters: [
                { name: "a", type: "int" },
                { name: "b", type: "int", modifier: "out" },
                { name: "c", type: "int", modifier: "ref" },
              ],
            },
          ],
        },
      ],
    })
    expect(c.types[0]?.methods[0]?.parameters.map((p) => [p.name, p.modifier, p.ordinal])).toEqual([
      ["a", "none", 0],
      ["b", "out", 1],
      ["c", "ref", 2],
    ])
  })

  it("reports where an unparsable type appears", () => {
    const result = makeCompilation(
      testManifest({
        types: [{ name: "A", namespace: "N", methods: [{ name: "M", returnType: "List<" }] }],
      }),
    )
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe(
        `Unexpected end of type "List<", expected a type name (return type of N.A.M)`,
      )
    }
  })

  it("accepts array parameters and members", () => {
    const c = testCompilation({
      types: [
        {
          name: "Doc",
          namespace: "N",
          properties: [{ name: "Tags", type: "string[]" }],
          methods: [{ name: "Save", returnType: "void", parameters: [{ name: "payload", type: "byte[]" }] }],
        },
      ],
    })
    expect(c.types[0]?.type.properties[0]?.type.display).toBe("string[]")
    expect(c.types[0]?.methods[0]?.parameters[0]?.type.display).toBe("byte[]")
  })

  it("answers attribute lookups regardless of suffix and namespace", () => {
    expect(compilation.hasAttribute("SqlProcedure")).toBe(true)
    expect(compilation.hasAttribute("SqlProcedureAttribute")).toBe(true)
    expect(compilation.hasAttribute("RawCommand")).toBe(false)
  })

  it("counts additional attributes", () => {
    const c = Either.getOrThrow(
      makeCompilation(testManifest({ types: [] }), { additionalAttributes: ["RawCommandAttribute"] }),
    )
    expect(c.hasAttribute("RawCommand")).toBe(true)
  })
})

describe("normalizeAttributeName", () => {
  it("strips namespace and suffix", () => {
    expect(normalizeAttributeName("A.B.SqlProcedureAttribute")).toBe("SqlProcedure")
    expect(normalizeAttributeName("RawCommand")).toBe("RawCommand")
    expect(normalizeAttributeName("Attribute")).toBe("Attribute")
  })
})
