/**
 * Static safety analysis for read-only SQL
 *
 * Rejects anything that is not a single SELECT, blocks mutating verbs even
 * when they only appear in comments, bounds join and subquery depth, and
 * rewrites accepted queries with a default LIMIT and a date-partition
 * lookback filter.
 *
 * This is a lexical/structural scanner over the token spans produced by
 * sql_tokenizer.ts, not a parser. Malformed SQL that defeats the heuristics
 * is an accepted residual risk; the backend runs every statement in a
 * READ ONLY transaction regardless.
 */

import { QueryGateError } from "./config.js"
import { COMMENT_KINDS, IDENTIFIER_KINDS, LITERAL_KINDS, commentBodies, maskSql, tokenizeSql } from "./sql_tokenizer.js"
import type { SqlTokenKind } from "./sql_tokenizer.js"

export interface SafetyLimits {
	defaultLimit: number
	maxJoinDepth: number
	maxSubqueryDepth: number
	partitionLookbackDays: number
	/** Table name (optionally schema-qualified) → date partition column */
	partitionedTables: Record<string, string>
}

export interface SqlVerdict {
	allowed: boolean
	reasons: string[]
	/** Present only when the query was allowed and rewritten */
	rewrittenSql?: string
}

const MUTATING_KEYWORDS = [
	"CREATE",
	"DROP",
	"ALTER",
	"INSERT",
	"UPDATE",
	"DELETE",
	"TRUNCATE",
	"MERGE",
	"GRANT",
	"REVOKE",
]

// Server-side functions with side effects or filesystem/network reach
const BLOCKED_FUNCTIONS = [
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"lo_export",
	"lo_import",
	"pg_sleep",
	"pg_terminate_backend",
	"pg_cancel_backend",
	"dblink",
	"dblink_connect",
	"dblink_exec",
	"pg_reload_conf",
	"pg_rotate_logfile",
	"pg_stat_reset",
]

const AGGREGATE_FUNCTIONS = [
	"COUNT",
	"SUM",
	"AVG",
	"MIN",
	"MAX",
	"ARRAY_AGG",
	"STRING_AGG",
	"JSON_AGG",
	"JSONB_AGG",
	"JSON_OBJECT_AGG",
	"JSONB_OBJECT_AGG",
	"BOOL_AND",
	"BOOL_OR",
	"EVERY",
	"STDDEV",
	"STDDEV_POP",
	"STDDEV_SAMP",
	"VARIANCE",
	"VAR_POP",
	"VAR_SAMP",
	"PERCENTILE_CONT",
	"PERCENTILE_DISC",
	"MODE",
]

const MUTATING_PATTERN = new RegExp(`\\b(${MUTATING_KEYWORDS.join("|")})\\b`, "i")
const BLOCKED_FUNCTION_PATTERN = new RegExp(`\\b(${BLOCKED_FUNCTIONS.join("|")})"?\\s*\\(`, "i")
const AGGREGATE_PATTERN = new RegExp(`\\b(?:${AGGREGATE_FUNCTIONS.join("|")})\\s*\\(`, "i")
const LIMIT_PATTERN = /\bLIMIT\b|\bFETCH\s+(?:FIRST|NEXT)\b/i
const GROUP_BY_PATTERN = /\bGROUP\s+BY\b/i
const TRAILING_CLAUSE_PATTERN = /\b(?:GROUP\s+BY|HAVING|WINDOW|QUALIFY|ORDER\s+BY|LIMIT|OFFSET|FETCH)\b/i
const SET_OPERATOR_SOURCE = "\\b(?:UNION|INTERSECT|EXCEPT)\\b(?:\\s+(?:ALL|DISTINCT)\\b)?"
const SUBQUERY_OPENER = /\(\s*(?:SELECT|WITH)\b/iy

const IDENT = '(?:"(?:[^"]|"")*"|`[^`]*`|[A-Za-z_][A-Za-z0-9_$]*)'
const RESERVED =
	"ON|USING|JOIN|INNER|LEFT|RIGHT|FULL|OUTER|CROSS|NATURAL|LATERAL|WHERE|GROUP|HAVING|WINDOW|QUALIFY|ORDER|LIMIT|OFFSET|FETCH|UNION|INTERSECT|EXCEPT|TABLESAMPLE|FOR|AS"
const TABLE_REF_SOURCE =
	`(?:^|,|\\bJOIN\\b)[\\s(]*(?:ONLY\\s+|LATERAL\\s+)?(?!(?:${RESERVED})\\b)` +
	`(${IDENT}(?:\\s*\\.\\s*${IDENT})*)` +
	`(?:\\s+(?:AS\\s+)?(?!(?:${RESERVED})\\b)(${IDENT}))?`
const CTE_NAME_SOURCE =
	`(?:\\bWITH(?:\\s+RECURSIVE)?|,)\\s*(${IDENT})\\s*(?:\\([^)]*\\)\\s*)?AS\\s*(?:NOT\\s+)?(?:MATERIALIZED\\s*)?\\(`

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_$]*(?:\.[A-Za-z_][A-Za-z0-9_$]*)*$/
const COLUMN_NAME = /^[A-Za-z_][A-Za-z0-9_$]*$/

const LIVE_MASK: ReadonlySet<SqlTokenKind> = new Set([...COMMENT_KINDS, ...LITERAL_KINDS])
const STRUCTURE_MASK: ReadonlySet<SqlTokenKind> = new Set([...COMMENT_KINDS, ...LITERAL_KINDS, ...IDENTIFIER_KINDS])

/** A SELECT body: the whole statement, or the inside of `( SELECT ... )` */
interface Scope {
	start: number
	end: number
	depth: number
	nested: Scope[]
}

interface Span {
	start: number
	end: number
}

interface Edit {
	at: number
	text: string
	/** Higher ranks land further right when two edits share an offset */
	rank: number
}

interface TableRef {
	written: string
	parts: string[]
	alias?: string
}

interface Views {
	text: string
	/** Comments blanked */
	bare: string
	/** Comments and literals blanked, quoted identifiers kept */
	live: string
	/** Everything but plain code blanked */
	structure: string
	levels: Int32Array
}

export class SafetyAnalyzer {
	private readonly partitions: Array<{ key: string; column: string }>

	constructor(private readonly limits: SafetyLimits) {
		requireInteger("defaultLimit", limits.defaultLimit, 1)
		requireInteger("maxJoinDepth", limits.maxJoinDepth, 0)
		requireInteger("maxSubqueryDepth", limits.maxSubqueryDepth, 0)
		requireInteger("partitionLookbackDays", limits.partitionLookbackDays, 1)

		this.partitions = Object.entries(limits.partitionedTables).map(([table, column]) => {
			if (!TABLE_NAME.test(table)) {
				throw new QueryGateError("configuration", `Invalid partitioned table name: ${table}`, { table })
			}
			if (!COLUMN_NAME.test(column)) {
				throw new QueryGateError("configuration", `Invalid partition column for ${table}: ${column}`, { table, column })
			}
			return { key: table.toLowerCase(), column }
		})
	}

	evaluate(sql: string): SqlVerdict {
		const text = sql.trim()
		if (text === "") return reject("Empty query")

		const tokens = tokenizeSql(text)
		const structure = maskSql(tokens, STRUCTURE_MASK)
		const live = maskSql(tokens, LIVE_MASK)
		const bare = maskSql(tokens, COMMENT_KINDS)

		// 1. One statement, optionally followed by a single semicolon
		const semicolon = structure.indexOf(";")
		if (semicolon !== -1 && structure.slice(semicolon + 1).trim() !== "") {
			return reject("Multiple statements not allowed")
		}

		// 2. Read-only SELECT / WITH only. Quoted identifiers stay visible here,
		// so a column named "delete" is rejected too.
		const operation = MUTATING_PATTERN.exec(live)
		if (operation) return reject(`Blocked operation: ${operation[1].toUpperCase()}`)

		const leading = /^[\s(]*([A-Za-z_]+)/.exec(structure)
		const verb = leading ? leading[1].toUpperCase() : ""
		if (verb !== "SELECT" && verb !== "WITH") return reject("Only SELECT queries are allowed")

		const blockedFunction = BLOCKED_FUNCTION_PATTERN.exec(live)
		if (blockedFunction) return reject(`Blocked function: ${blockedFunction[1].toLowerCase()}`)

		// 3. Mutating verbs hidden in comments
		if (commentBodies(tokens).some((body) => MUTATING_PATTERN.test(body))) {
			return reject("Dangerous SQL found in comments")
		}

		const bodyEnd = trimEnd(bare, semicolon === -1 ? text.length : semicolon, 0)
		const views: Views = { text, bare, live, structure, levels: nestingLevels(structure) }
		const scopes = findScopes(views, bodyEnd)

		// 4. Joins per SELECT body
		const joinDepth = Math.max(...scopes.map((scope) => countMatches(scopeView(structure, scope), /\bJOIN\b/gi)))
		if (joinDepth > this.limits.maxJoinDepth) {
			return reject(`Join depth exceeds max (${this.limits.maxJoinDepth})`)
		}

		// 5. Nested SELECTs
		if (subqueryNesting(scopes) > this.limits.maxSubqueryDepth) {
			return reject(`Subquery nesting exceeds max (${this.limits.maxSubqueryDepth})`)
		}

		const edits: Edit[] = []
		const reasons: string[] = []

		// 6. Default LIMIT on plain row-returning queries
		const top = scopes[0]
		const topOwn = scopeView(structure, top, views.levels)
		if (!LIMIT_PATTERN.test(topOwn) && !GROUP_BY_PATTERN.test(topOwn) && !AGGREGATE_PATTERN.test(projection(topOwn))) {
			edits.push({ at: bodyEnd, text: ` LIMIT ${this.limits.defaultLimit}`, rank: 1 })
			reasons.push("LIMIT auto-added")
		}

		// 7. Lookback filter on date-partitioned tables
		if (this.partitions.length > 0) {
			const ctes = cteNames(views, scopes)
			for (const scope of scopes) {
				this.addPartitionFilters(views, scope, ctes, edits, reasons)
			}
		}

		if (edits.length === 0) return { allowed: true, reasons }
		return { allowed: true, reasons, rewrittenSql: applyEdits(text, edits) }
	}

	private addPartitionFilters(views: Views, scope: Scope, ctes: Set<string>, edits: Edit[], reasons: string[]): void {
		const own = scopeView(views.structure, scope, views.levels)
		const live = scopeView(views.live, scope)

		for (const branch of splitBranches(own, scope)) {
			const from = firstMatch(own, /\bFROM\b/i, branch.start, branch.end)
			if (!from) continue
			const where = firstMatch(own, /\bWHERE\b/i, from.end, branch.end)
			const trailing = firstMatch(own, TRAILING_CLAUSE_PATTERN, where ? where.end : from.end, branch.end)
			const clauseEnd = trailing ? trailing.start : branch.end
			const fromEnd = where ? where.start : clauseEnd
			const whereText = where ? live.slice(where.end, clauseEnd) : ""

			const filters: string[] = []
			for (const ref of tableRefs(live.slice(from.end, fromEnd))) {
				if (ref.parts.length === 1 && ctes.has(ref.parts[0])) continue
				const partition = this.partitionFor(ref.parts)
				if (!partition) continue
				const qualifier = ref.alias ?? ref.written
				if (where && isBound(whereText, qualifier, partition.column)) continue

				filters.push(
					`${qualifier}.${partition.column} >= CURRENT_DATE - INTERVAL '${this.limits.partitionLookbackDays} days'`,
				)
				reasons.push(`Partition filter auto-added on ${partition.key}`)
			}
			if (filters.length === 0) continue

			const condition = filters.join(" AND ")
			if (where) {
				const open = skipWhitespace(views.bare, where.end, clauseEnd)
				const close = trimEnd(views.bare, clauseEnd, open)
				edits.push({ at: open, text: "(", rank: 0 }, { at: close, text: `) AND ${condition}`, rank: 0 })
			} else {
				edits.push({ at: trimEnd(views.bare, clauseEnd, from.end), text: ` WHERE ${condition}`, rank: 0 })
			}
		}
	}

	private partitionFor(parts: string[]): { key: string; column: string } | undefined {
		const name = parts.join(".")
		return this.partitions.find(
			(partition) =>
				partition.key === name || name.endsWith(`.${partition.key}`),
		)
	}
}

function reject(reason: string): SqlVerdict {
	return { allowed: false, reasons: [reason] }
}

function requireInteger(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new QueryGateError("configuration", `${name} must be an integer >= ${min}, got ${value}`, { [name]: value })
	}
}

// ── Structure ────────────────────────────────────────────────────────

/**
 * Paren depth at each offset. An opening paren sits at the outer level,
 * its contents one deeper, and the closing paren back at the outer level.
 */
function nestingLevels(structure: string): Int32Array {
	const levels = new Int32Array(structure.length)
	let depth = 0
	for (let i = 0; i < structure.length; i++) {
		const ch = structure[i]
		if (ch === "(") {
			levels[i] = depth
			depth++
		} else if (ch === ")") {
			depth = Math.max(0, depth - 1)
			levels[i] = depth
		} else {
			levels[i] = depth
		}
	}
	return levels
}

function findScopes(views: Views, bodyEnd: number): Scope[] {
	const { structure, levels } = views
	const scopes: Scope[] = [{ start: 0, end: bodyEnd, depth: 0, nested: [] }]

	for (let i = 0; i < bodyEnd; i++) {
		if (structure[i] !== "(") continue
		SUBQUERY_OPENER.lastIndex = i
		if (!SUBQUERY_OPENER.test(structure)) continue

		let close = bodyEnd
		for (let j = i + 1; j < bodyEnd; j++) {
			if (structure[j] === ")" && levels[j] === levels[i]) {
				close = j
				break
			}
		}
		scopes.push({ start: i + 1, end: close, depth: levels[i] + 1, nested: [] })
	}

	for (const scope of scopes) {
		scope.nested = scopes.filter((other) => other !== scope && other.start >= scope.start && other.end <= scope.end)
	}
	return scopes
}

function subqueryNesting(scopes: Scope[]): number {
	const subqueries = scopes.slice(1)
	let deepest = 0
	for (const scope of subqueries) {
		const enclosing = subqueries.filter((other) => other.nested.includes(scope)).length
		deepest = Math.max(deepest, enclosing + 1)
	}
	return deepest
}

/**
 * The scope's own text: everything outside it and inside its nested
 * subqueries is blanked. With `levels`, text inside non-subquery parens
 * (function arguments, window specs) is blanked as well.
 */
function scopeView(view: string, scope: Scope, levels?: Int32Array): string {
	const chars = view.split("")
	for (let i = 0; i < chars.length; i++) {
		const hidden =
			i < scope.start ||
			i >= scope.end ||
			scope.nested.some((inner) => i >= inner.start && i < inner.end) ||
			(levels !== undefined && levels[i] !== scope.depth)
		if (hidden && chars[i] !== "\n") chars[i] = " "
	}
	return chars.join("")
}

function splitBranches(own: string, scope: Scope): Span[] {
	const branches: Span[] = []
	const pattern = new RegExp(SET_OPERATOR_SOURCE, "gi")
	let start = scope.start
	let match: RegExpExecArray | null
	while ((match = pattern.exec(own)) !== null) {
		branches.push({ start, end: match.index })
		start = match.index + match[0].length
	}
	branches.push({ start, end: scope.end })
	return branches
}

/** Text between the first SELECT and its FROM */
function projection(own: string): string {
	const select = /\bSELECT\b/i.exec(own)
	if (!select) return ""
	const rest = own.slice(select.index + select[0].length)
	const from = /\bFROM\b/i.exec(rest)
	return from ? rest.slice(0, from.index) : rest
}

function cteNames(views: Views, scopes: Scope[]): Set<string> {
	const names = new Set<string>()
	for (const scope of scopes) {
		const own = scopeView(views.live, scope, views.levels)
		const pattern = new RegExp(CTE_NAME_SOURCE, "gi")
		let match: RegExpExecArray | null
		while ((match = pattern.exec(own)) !== null) {
			names.add(normalizeIdentifier(match[1]))
		}
	}
	return names
}

function tableRefs(fromClause: string): TableRef[] {
	const refs: TableRef[] = []
	const pattern = new RegExp(TABLE_REF_SOURCE, "gi")
	let match: RegExpExecArray | null
	while ((match = pattern.exec(fromClause)) !== null) {
		const written = match[1]
		const parts = written.match(new RegExp(IDENT, "g")) ?? []
		const alias: string | undefined = match[2]
		refs.push({ written, parts: parts.map(normalizeIdentifier), alias })
	}
	return refs
}

function normalizeIdentifier(identifier: string): string {
	if (identifier.startsWith('"') && identifier.endsWith('"') && identifier.length >= 2) {
		return identifier.slice(1, -1).replace(/""/g, '"').toLowerCase()
	}
	if (identifier.startsWith("`") && identifier.endsWith("`") && identifier.length >= 2) {
		return identifier.slice(1, -1).toLowerCase()
	}
	return identifier.toLowerCase()
}

/** Whether the WHERE text mentions the partition column, qualified or bare */
function isBound(whereText: string, qualifier: string, column: string): boolean {
	const col = escapeRegExp(column)
	const qualified = new RegExp(`(?<![\\w$])${escapeRegExp(qualifier)}\\s*\\.\\s*"?${col}\\b`, "i")
	const unqualified = new RegExp(`(?<![.\\w$"])"?${col}\\b`, "i")
	return qualified.test(whereText) || unqualified.test(whereText)
}

// ── Text helpers ─────────────────────────────────────────────────────

function firstMatch(view: string, pattern: RegExp, from: number, to: number): Span | null {
	const match = pattern.exec(view.slice(from, to))
	if (!match) return null
	return { start: from + match.index, end: from + match.index + match[0].length }
}

function countMatches(view: string, pattern: RegExp): number {
	return (view.match(pattern) ?? []).length
}

function trimEnd(view: string, end: number, floor: number): number {
	let i = end
	while (i > floor && /\s/.test(view[i - 1])) i--
	return i
}

function skipWhitespace(view: string, start: number, limit: number): number {
	let i = start
	while (i < limit && /\s/.test(view[i])) i++
	return i
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

function applyEdits(text: string, edits: Edit[]): string {
	const ordered = [...edits].sort((a, b) => b.at - a.at || b.rank - a.rank)
	let result = text
	for (const edit of ordered) {
		result = result.slice(0, edit.at) + edit.text + result.slice(edit.at)
	}
	return result
}
