import { describe, it, expect } from "@effect/vitest"
import { Either, Option } from "effect"
import { CodeBuilder } from "../lib/code-builder.js"
import { defaultInflection } from "../services/inflection.js"
import { classifyType } from "../synth/classify.js"
import { ConnectionStrategy } from "../synth/connection.js"
import {
  convertFromDb,
  emitExecution,
  resolveEntitySet,
  selectStrategy,
  typeReference,
  type ExecutionStrategy,
} from "../synth/materialize.js"
import { extractBinding } from "../synth/signature.js"
import { testCompilation } from "../testing.js"

const compilation = testCompilation({
  types: [
    { name: "Item", namespace: "Foo", properties: [{ name: "Id", type: "int" }] },
    { name: "Inner", namespace: "Foo", containingType: "Outer" },
    { name: "Loose" },
    {
      name: "Shop",
      namespace: "Foo",
      baseType: "DbContext",
      properties: [
        { name: "Things", type: "DbSet<Item>" },
        { name: "Name", type: "string" },
      ],
    },
    {
      name: "Repo",
      namespace: "Foo",
      methods: [
        {
          name: "Touch",
          returnType: "void",
          attributes: [{ name: "SqlProcedure" }],
          parameters: [{ name: "name", type: "string?", modifier: "out" }],
        },
        { name: "One", returnType: "Item?", attributes: [{ name: "SqlProcedure" }] },
        { name: "Many", returnType: "List<Item>", attributes: [{ name: "SqlProcedure", named: { EntitySet: "Stock" } }] },
        { name: "Count", returnType: "long", attributes: [{ name: "SqlProcedure" }] },
      ],
    },
  ],
})

const type = (text: string) => Either.getOrThrow(compilation.resolveType(text, "Foo"))
const shop = type("Shop")

const bindingOf = (name: string) => {
  const method = compilation.types.find((t) => t.type.name === "Repo")?.methods.find((m) => m.name === name)
  if (method === undefined) throw new Error(`no method ${name}`)
  return Option.getOrThrow(extractBinding(method))
}

const strategyOf = (name: string, connection: ConnectionStrategy): ExecutionStrategy => {
  const binding = bindingOf(name)
  return selectStrategy(binding, Either.getOrThrow(classifyType(binding.returnType)), connection, defaultInflection)
}

const found = ConnectionStrategy.Found({ field: "conn" })
const context = ConnectionStrategy.FoundContext({ field: "shop", contextType: shop })
const assumed = ConnectionStrategy.AssumedDefault({ name: "dbContext" })

describe("convertFromDb", () => {
  it("casts directly when null is impossible", () => {
    expect(convertFromDb("value", type("int"), "disable")).toBe("(int)value")
    expect(convertFromDb("value", type("string"), "enable")).toBe("(string)value")
  })

  it("maps DBNull to null otherwise", () => {
    expect(convertFromDb("value", type("int?"), "enable")).toBe(
      "value == DBNull.Value ? (int?)null : (int)value",
    )
    expect(convertFromDb("value", type("string"), "disable")).toBe(
      "value == DBNull.Value ? (string)null : (string)value",
    )
    expect(convertFromDb("value", type("string?"), "enable")).toBe(
      "value == DBNull.Value ? (string?)null : (string)value",
    )
  })
})

describe("convertFromDb with orNull", () => {
  it("also maps a missing value to null", () => {
    expect(convertFromDb("result", type("decimal?"), "enable", { orNull: true })).toBe(
      "result == null || result == DBNull.Value ? (decimal?)null : (decimal)result",
    )
  })

  it("leaves non-nullable casts alone", () => {
    expect(convertFromDb("result", type("long"), "enable", { orNull: true })).toBe("(long)result")
  })
})

describe("typeReference", () => {
  it("uses the simple name inside the same namespace", () => {
    expect(typeReference(type("Item"), "Foo")).toBe("Item")
    expect(typeReference(type("Outer.Inner"), "Foo")).toBe("Outer.Inner")
  })

  it("qualifies types from other namespaces", () => {
    expect(typeReference(type("Item"), "Bar")).toBe("Foo.Item")
  })

  it("never qualifies global types", () => {
    expect(typeReference(type("Loose"), "Bar")).toBe("Loose")
  })
})

describe("resolveEntitySet", () => {
  it("prefers a matching DbSet property", () => {
    expect(resolveEntitySet(shop, type("Item"), defaultInflection)).toBe("Things")
  })

  it("falls back to the inflected type name", () => {
    expect(resolveEntitySet(shop, type("Loose"), defaultInflection)).toBe("Looses")
  })
})

describe("selectStrategy", () => {
  it("picks scalar and non-query regardless of connection", () => {
    expect(strategyOf("Count", context)._tag).toBe("Scalar")
    expect(strategyOf("Touch", found)._tag).toBe("NonQuery")
  })

  it("maps entities manually without a context field", () => {
    expect(strategyOf("One", found)._tag).toBe("Manual")
    expect(strategyOf("Many", assumed)._tag).toBe("Manual")
  })

  it("uses EF Core with a context field", () => {
    const one = strategyOf("One", context)
    expect(one._tag === "EntityFramework" ? [one.context, one.entitySet] : undefined).toEqual(["shop", "Things"])
    const many = strategyOf("Many", context)
    expect(many._tag === "EntityFramework" ? many.entitySet : undefined).toBe("Stock")
  })
})

describe("emitExecution", () => {
  it("runs a non-query on an owned connection and reads outputs back", () => {
    const binding = bindingOf("Touch")
    const code = new CodeBuilder()
    const spec = binding.parameters[0]
    if (spec === undefined) throw new Error("missing parameter")
    emitExecution(code, strategyOf("Touch", found), {
      binding,
      parameters: [
        { spec, variable: "nameParameter", reference: "name", externalName: "@name", dbType: "String", nullable: true },
      ],
      connection: found,
      nullable: "enable",
      namespace: "Foo",
      commandText: "sqlQuery",
    })
    expect(code.toString().split("\n")).toEqual([
      "command.CommandText = sqlQuery;",
      "command.Parameters.AddRange(parameters);",
      "command.ExecuteNonQuery();",
      "name = nameParameter.Value == DBNull.Value ? (string?)null : (string)nameParameter.Value;",
    ])
  })

  it("reads a single entity through EF Core", () => {
    const code = new CodeBuilder()
    emitExecution(code, strategyOf("One", context), {
      binding: bindingOf("One"),
      parameters: [],
      connection: context,
      nullable: "enable",
      namespace: "Foo",
      commandText: "sqlQuery",
    })
    expect(code.toString().split("\n")).toEqual([
      "var result = this.shop.Things.FromSqlRaw(sqlQuery).AsEnumerable().FirstOrDefault();",
      "return result;",
    ])
  })
})
