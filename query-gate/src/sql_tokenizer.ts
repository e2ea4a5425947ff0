/**
 * Lexical splitter for SQL text
 *
 * Splits a statement into code, literal, quoted-identifier and comment spans
 * so the analyzers can look at "live" SQL without being fooled by keywords
 * or semicolons that sit inside strings and comments.
 *
 * Spans cover the input exactly: concatenating every token's text gives the
 * original string back. Unterminated literals and comments run to the end
 * of the input.
 */

export type SqlTokenKind =
	| "code"
	| "string"
	| "quoted_identifier"
	| "backtick_identifier"
	| "dollar_string"
	| "line_comment"
	| "block_comment"

export interface SqlToken {
	kind: SqlTokenKind
	start: number
	end: number
	text: string
}

export const COMMENT_KINDS: ReadonlySet<SqlTokenKind> = new Set(["line_comment", "block_comment"])
export const LITERAL_KINDS: ReadonlySet<SqlTokenKind> = new Set(["string", "dollar_string"])
export const IDENTIFIER_KINDS: ReadonlySet<SqlTokenKind> = new Set(["quoted_identifier", "backtick_identifier"])

const DOLLAR_TAG = /\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/y

export function tokenizeSql(sql: string): SqlToken[] {
	const tokens: SqlToken[] = []
	const push = (kind: SqlTokenKind, start: number, end: number) => {
		if (end > start) tokens.push({ kind, start, end, text: sql.slice(start, end) })
	}

	let codeStart = 0
	let i = 0
	while (i < sql.length) {
		const ch = sql[i]
		const next = sql[i + 1]
		let kind: SqlTokenKind | null = null
		let end = i

		if (ch === "-" && next === "-") {
			kind = "line_comment"
			end = scanLineComment(sql, i)
		} else if (ch === "/" && next === "*") {
			kind = "block_comment"
			end = scanBlockComment(sql, i)
		} else if (ch === "'") {
			kind = "string"
			end = scanQuoted(sql, i, "'", isEscapeString(sql, i))
		} else if (ch === '"') {
			kind = "quoted_identifier"
			end = scanQuoted(sql, i, '"', false)
		} else if (ch === "`") {
			kind = "backtick_identifier"
			end = scanQuoted(sql, i, "`", false)
		} else if (ch === "$") {
			const tag = dollarTag(sql, i)
			if (tag !== null) {
				kind = "dollar_string"
				end = scanDollarString(sql, i, tag)
			}
		}

		if (kind === null) {
			i++
			continue
		}
		push("code", codeStart, i)
		push(kind, i, end)
		i = end
		codeStart = end
	}
	push("code", codeStart, sql.length)
	return tokens
}

/**
 * Rebuild the text with every token of a blanked kind replaced by spaces.
 *
 * Newlines survive and the result has the same length as the input, so
 * offsets found in the masked text are valid in the original.
 */
export function maskSql(tokens: readonly SqlToken[], blank: ReadonlySet<SqlTokenKind>): string {
	return tokens.map((token) => (blank.has(token.kind) ? token.text.replace(/[^\n]/g, " ") : token.text)).join("")
}

/** Text of every comment, markers included */
export function commentBodies(tokens: readonly SqlToken[]): string[] {
	return tokens.filter((token) => COMMENT_KINDS.has(token.kind)).map((token) => token.text)
}

function scanLineComment(sql: string, start: number): number {
	const newline = sql.indexOf("\n", start)
	return newline === -1 ? sql.length : newline
}

// Block comments nest in Postgres
function scanBlockComment(sql: string, start: number): number {
	let depth = 1
	let j = start + 2
	while (j < sql.length) {
		if (sql[j] === "/" && sql[j + 1] === "*") {
			depth++
			j += 2
		} else if (sql[j] === "*" && sql[j + 1] === "/") {
			depth--
			j += 2
			if (depth === 0) return j
		} else {
			j++
		}
	}
	return sql.length
}

function scanQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
	let j = start + 1
	while (j < sql.length) {
		const c = sql[j]
		if (backslashEscapes && c === "\\") {
			j += 2
			continue
		}
		if (c === quote) {
			// Doubled quote is an escaped quote
			if (sql[j + 1] === quote) {
				j += 2
				continue
			}
			return j + 1
		}
		j++
	}
	return sql.length
}

/** E'...' strings take backslash escapes */
function isEscapeString(sql: string, quoteAt: number): boolean {
	if (quoteAt === 0) return false
	const prefix = sql[quoteAt - 1]
	if (prefix !== "E" && prefix !== "e") return false
	return quoteAt < 2 || !/[\w$]/.test(sql[quoteAt - 2])
}

function dollarTag(sql: string, start: number): string | null {
	// `a$b$` and `$1` are not quote openers
	if (start > 0 && /[\w$]/.test(sql[start - 1])) return null
	DOLLAR_TAG.lastIndex = start
	const match = DOLLAR_TAG.exec(sql)
	return match ? match[0] : null
}

function scanDollarString(sql: string, start: number, tag: string): number {
	const close = sql.indexOf(tag, start + tag.length)
	return close === -1 ? sql.length : close + tag.length
}
