import { describe, it, expect } from "@effect/vitest"
import {
  accessExpression,
  closeConnectionStatement,
  openConnectionStatement,
  requiresExplicitOpenClose,
  resolveConnectionStrategy,
  usesEntityFramework,
} from "../synth/connection.js"
import type { ManifestInput } from "../ir/manifest.js"
import { testCompilation } from "../testing.js"

type TypeInput = ManifestInput["types"][number]

const strategyFor = (declaration: TypeInput, defaultName?: string) => {
  const compilation = testCompilation({
    types: [{ name: "Shop", namespace: "App", baseType: "Microsoft.EntityFrameworkCore.DbContext" }, declaration],
  })
  const declared = compilation.types.find((t) => t.type.name === declaration.name)
  if (declared === undefined) throw new Error("type not found")
  return resolveConnectionStrategy(declared.type, defaultName)
}

describe("resolveConnectionStrategy", () => {
  it("finds a connection field", () => {
    const strategy = strategyFor({ name: "R", namespace: "App", fields: [{ name: "conn", type: "DbConnection" }] })
    expect(strategy._tag).toBe("Found")
    expect(accessExpression(strategy)).toBe("this.conn")
    expect(requiresExplicitOpenClose(strategy)).toBe(false)
    expect(usesEntityFramework(strategy)).toBe(false)
  })

  it("accepts provider connections deriving from DbConnection", () => {
    const strategy = strategyFor({ name: "R", namespace: "App", fields: [{ name: "conn", type: "SqlConnection" }] })
    expect(strategy._tag).toBe("Found")
  })

  it("finds a context field", () => {
    const strategy = strategyFor({
      name: "R",
      namespace: "App",
      fields: [
        { name: "count", type: "int" },
        { name: "shop", type: "Shop" },
      ],
    })
    expect(strategy._tag).toBe("FoundContext")
    expect(accessExpression(strategy)).toBe("this.shop.Database.GetDbConnection()")
    expect(openConnectionStatement(strategy)).toBe("this.shop.Database.OpenConnection();")
    expect(closeConnectionStatement(strategy)).toBe("this.shop.Database.CloseConnection();")
    expect(requiresExplicitOpenClose(strategy)).toBe(true)
    expect(usesEntityFramework(strategy)).toBe(true)
  })

  it("prefers a connection field over an earlier context field", () => {
    const strategy = strategyFor({
      name: "R",
      namespace: "App",
      fields: [
        { name: "shop", type: "Shop" },
        { name: "conn", type: "DbConnection" },
      ],
    })
    expect(strategy._tag).toBe("Found")
    expect(accessExpression(strategy)).toBe("this.conn")
  })

  it("assumes a conventional context otherwise", () => {
    const strategy = strategyFor({ name: "R", namespace: "App" })
    expect(strategy._tag).toBe("AssumedDefault")
    expect(accessExpression(strategy)).toBe("this.dbContext.Database.GetDbConnection()")
    expect(requiresExplicitOpenClose(strategy)).toBe(true)
  })

  it("uses a configured default context name", () => {
    const strategy = strategyFor({ name: "R", namespace: "App" }, "db")
    expect(accessExpression(strategy)).toBe("this.db.Database.GetDbConnection()")
    expect(openConnectionStatement(strategy)).toBe("this.db.Database.OpenConnection();")
  })
})
