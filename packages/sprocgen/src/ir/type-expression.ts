/**
 * Type Expression Parser
 *
 * Manifests spell type references the way the C# source does:
 * `int`, `string?`, `IList<Item>`, `System.Nullable<long>`,
 * `Dictionary<string, Foo.Bar?>`, `byte[]`. This module turns that text into a small
 * tree that the compilation model resolves against declared types.
 */
import { Either } from "effect"
import { TypeExpressionInvalid } from "../errors.js"

/**
 * A parsed type reference by name.
 */
export interface NamedTypeExpression {
  /** Name as written, possibly qualified (`System.Int32`) */
  readonly name: string
  readonly typeArguments: readonly TypeExpression[]
  /** Trailing `?` */
  readonly nullable: boolean
}

/**
 * An array type: `byte[]`, `int[,]`, `string?[]?`.
 */
export interface ArrayTypeExpression {
  readonly element: TypeExpression
  /** Number of dimensions, one more than the commas inside the brackets */
  readonly rank: number
  /** `?` after the rank specifier */
  readonly nullable: boolean
}

export type TypeExpression = NamedTypeExpression | ArrayTypeExpression

export const isArrayExpression = (type: TypeExpression): type is ArrayTypeExpression =>
  "element" in type

/** `[]` for rank 1, `[,]` for rank 2, ... */
export const rankSpecifier = (rank: number): string => `[${",".repeat(Math.max(rank - 1, 0))}]`

type Punctuation = "<" | ">" | "," | "?" | "[" | "]"

type Token =
  | { readonly kind: "ident"; readonly text: string; readonly position: number }
  | { readonly kind: "punct"; readonly text: Punctuation; readonly position: number }
  | { readonly kind: "end"; readonly position: number }

const isPunctuation = (ch: string): ch is Punctuation =>
  ch === "<" || ch === ">" || ch === "," || ch === "?" || ch === "[" || ch === "]"

const IDENT = /[A-Za-z_@][A-Za-z0-9_]*(?:\s*\.\s*[A-Za-z_@][A-Za-z0-9_]*)*/y

function tokenize(text: string): Either.Either<readonly Token[], TypeExpressionInvalid> {
  const tokens: Token[] = []
  let i = 0
  while (i < text.length) {
    const ch = text.charAt(i)
    if (/\s/.test(ch)) {
      i++
      continue
    }
    if (isPunctuation(ch)) {
      tokens.push({ kind: "punct", text: ch, position: i })
      i++
      continue
    }
    IDENT.lastIndex = i
    const match = IDENT.exec(text)
    if (match === null) {
      return Either.left(
        new TypeExpressionInvalid({
          message: `Unexpected character '${ch}' in type "${text}"`,
          expression: text,
          position: i,
        }),
      )
    }
    tokens.push({ kind: "ident", text: match[0].replace(/\s+/g, ""), position: i })
    i += match[0].length
  }
  tokens.push({ kind: "end", position: text.length })
  return Either.right(tokens)
}

/**
 * Parse a type expression.
 *
 * @example
 * parseTypeExpression("IList<Item?>")
 * // { name: "IList", nullable: false, typeArguments: [{ name: "Item", nullable: true, typeArguments: [] }] }
 */
export function parseTypeExpression(
  text: string,
): Either.Either<TypeExpression, TypeExpressionInvalid> {
  return Either.flatMap(tokenize(text), (tokens) => {
    let index = 0
    const peek = (): Token => tokens[index] ?? { kind: "end", position: text.length }

    const fail = (token: Token, expected: string) =>
      new TypeExpressionInvalid({
        message:
          token.kind === "end"
            ? `Unexpected end of type "${text}", expected ${expected}`
            : `Unexpected '${token.text}' at ${token.position} in type "${text}", expected ${expected}`,
        expression: text,
        position: token.position,
      })

    const takeQuestion = (): boolean => {
      const question = peek()
      const nullable = question.kind === "punct" && question.text === "?"
      if (nullable) index++
      return nullable
    }

    const parseType = (): Either.Either<TypeExpression, TypeExpressionInvalid> => {
      const head = peek()
      if (head.kind !== "ident") return Either.left(fail(head, "a type name"))
      index++

      const typeArguments: TypeExpression[] = []
      const open = peek()
      if (open.kind === "punct" && open.text === "<") {
        index++
        for (;;) {
          const argument = parseType()
          if (Either.isLeft(argument)) return argument
          typeArguments.push(argument.right)
          const next = peek()
          if (next.kind === "punct" && next.text === ",") {
            index++
            continue
          }
          if (next.kind === "punct" && next.text === ">") {
            index++
            break
          }
          return Either.left(fail(next, "',' or '>'"))
        }
      }

      let parsed: TypeExpression = { name: head.text, typeArguments, nullable: takeQuestion() }

      for (;;) {
        const bracket = peek()
        if (!(bracket.kind === "punct" && bracket.text === "[")) break
        index++
        let rank = 1
        for (;;) {
          const next = peek()
          if (next.kind === "punct" && next.text === ",") {
            index++
            rank++
            continue
          }
          if (next.kind === "punct" && next.text === "]") {
            index++
            break
          }
          return Either.left(fail(next, "',' or ']'"))
        }
        parsed = { element: parsed, rank, nullable: takeQuestion() }
      }

      return Either.right(parsed)
    }

    return Either.flatMap(parseType(), (parsed) => {
      const rest = peek()
      return rest.kind === "end" ? Either.right(parsed) : Either.left(fail(rest, "end of type"))
    })
  })
}

/**
 * Print a type expression back in canonical form.
 */
export function formatTypeExpression(type: TypeExpression): string {
  if (isArrayExpression(type)) {
    return `${formatTypeExpression(type.element)}${rankSpecifier(type.rank)}${type.nullable ? "?" : ""}`
  }
  const args =
    type.typeArguments.length > 0
      ? `<${type.typeArguments.map(formatTypeExpression).join(", ")}>`
      : ""
  return `${type.name}${args}${type.nullable ? "?" : ""}`
}
