/**
 * CodeBuilder - indentation-aware text assembly for C# output
 *
 * Synthesis code only ever calls `line`, `blank` and `block`; raw string
 * concatenation of generated code stays in here.
 *
 * @example
 * ```typescript
 * const code = new CodeBuilder()
 * code.block("partial class C", (body) => {
 *   body.line("private int x;")
 * })
 * code.toString()
 * // partial class C
 * // {
 * //     private int x;
 * // }
 * ```
 */
export class CodeBuilder {
  private readonly out: string[]
  private depth: number
  private readonly unit: string

  constructor(options: { readonly indent?: string; readonly depth?: number } = {}) {
    this.out = []
    this.unit = options.indent ?? "    "
    this.depth = options.depth ?? 0
  }

  /** Append one statement line at the current indentation */
  line(text: string): this {
    this.out.push(text === "" ? "" : this.unit.repeat(this.depth) + text)
    return this
  }

  /** Append several lines */
  lines(texts: readonly string[]): this {
    texts.forEach((text) => this.line(text))
    return this
  }

  /** Append an empty line (never indented) */
  blank(): this {
    this.out.push("")
    return this
  }

  /**
   * Append `header`, then `{`, the indented body, and `}` + `closing`.
   * A header of `undefined` opens a bare block.
   */
  block(header: string | undefined, body: (code: this) => void, closing = ""): this {
    if (header !== undefined) this.line(header)
    this.line("{")
    this.indent(body)
    this.line("}" + closing)
    return this
  }

  /** Run `body` one level deeper */
  indent(body: (code: this) => void): this {
    this.depth++
    try {
      body(this)
    } finally {
      this.depth--
    }
    return this
  }

  /** Lines joined with `\n`, without a trailing newline */
  toString(): string {
    return this.out.join("\n")
  }
}
