/**
 * SQL Normalization
 *
 * Deterministic rewrite of defects the oracle is known to produce in
 * generated SQLite queries. Each rule is a named, idempotent text
 * transform; rules run in a fixed order and never call the oracle.
 */

import type { Constraints } from "./config.js"

// ============================================================================
// Types
// ============================================================================

export interface NormalizeResult {
	/** Normalized SQL */
	sql: string
	/** Names of the rules that changed the text, in order */
	applied: string[]
	/** Whether any rule changed the text */
	changed: boolean
}

export interface NormalizeContext {
	constraints?: Constraints | null
}

export interface RewriteRule {
	name: string
	apply: (sql: string, ctx: NormalizeContext) => string
}

// ============================================================================
// Code fences
// ============================================================================

/** Unwrap a Markdown code block (```sql ... ```) if the reply has one. */
export function stripCodeFences(text: string): string {
	const fenced = text.match(/```[\w-]*[ \t]*\n?([\s\S]*?)```/)
	if (fenced) return fenced[1].trim()
	return text.replace(/^\s*```[\w-]*/, "").replace(/```\s*$/, "").trim()
}

// ============================================================================
// Rule data
// ============================================================================

const KEYWORD_TYPOS: Array<[RegExp, string]> = [
	[/\b(?:strftme|strfime|strftiem|sttrftime|strfftime|strftimes|strtime|strf_time)\b/gi, "strftime"],
	[/\b(?:betwen|beteen|betweeen|bewteen|beetween|betwene)\b/gi, "BETWEEN"],
]

/** Tables whose names contain spaces and must be double-quoted in SQLite */
export const MULTIWORD_TABLES = ["Order Details"]

/** Misspelled column tokens and their canonical Northwind column names */
const PLACEHOLDER_COLUMNS: Record<string, string> = {
	Order_Date: "OrderDate",
	Unit_Price: "UnitPrice",
	Product_Name: "ProductName",
	Category_Name: "CategoryName",
	Company_Name: "CompanyName",
	Order_ID: "OrderID",
	Product_ID: "ProductID",
	Customer_ID: "CustomerID",
	Category_ID: "CategoryID",
	Qty: "Quantity",
	Discount_Rate: "Discount",
}

const AVERAGE_ALIAS = /avg|average|aov|mean|per_?order/i

const AVERAGE_KPI = /\baov\b|average/i

// ============================================================================
// Helpers
// ============================================================================

function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/** Date literal: 'YYYY-MM-DD' with an optional time part; captures YYYY-MM */
const DATE_LITERAL = `'(\\d{4}-\\d{2})-\\d{2}(?:[ T][\\d:.]+)?'`

/** Column reference: col, t.col, "col" or t."col"; never a bare NOT/AND/OR */
const COLUMN_REF = `(?<![\\w."])((?!(?:NOT|AND|OR)\\b)(?:\\w+\\.)?(?:\\w+|"[^"]+"))`

/** Single-quoted SQL string literal, '' escapes included */
const STRING_LITERAL = /('(?:[^']|'')*')/

/** Apply `rewrite` to the text between string literals, leaving literals untouched. */
function outsideLiterals(sql: string, rewrite: (code: string) => string): string {
	return sql
		.split(STRING_LITERAL)
		.map((part, index) => (index % 2 === 1 ? part : rewrite(part)))
		.join("")
}

/** Alias of the select item that continues at `from`, if any. */
function aliasAfter(sql: string, from: number): string | null {
	const rest = sql.slice(from)
	const fromIdx = rest.search(/\bFROM\b/i)
	const scope = fromIdx >= 0 ? rest.slice(0, fromIdx) : rest
	const match = scope.match(/\bAS\s+["'`[]?([A-Za-z_]\w*)/i)
	return match ? match[1] : null
}

/** Lowercased table names and aliases introduced by FROM, JOIN, comma joins and subqueries. */
function collectSources(sql: string): Set<string> {
	const sources = new Set<string>()
	const add = (name: string | undefined) => {
		if (name) sources.add(name.replace(/^["[`]|["\]`]$/g, "").toLowerCase())
	}

	const patterns = [
		/\b(?:FROM|JOIN)\s+("[^"]+"|\[[^\]]+\]|`[^`]+`|\w+)(?:\s+(?:AS\s+)?(\w+))?/gi,
		/,\s*("[^"]+"|\w+)\s+(?:AS\s+)?(\w+)/gi,
		/\)\s*(?:AS\s+)?()([A-Za-z_]\w*)/gi,
	]
	for (const pattern of patterns) {
		for (const match of sql.matchAll(pattern)) {
			add(match[1])
			add(match[2])
		}
	}
	return sources
}

// ============================================================================
// Rules
// ============================================================================

/** 1. Misspelled date-formatting and range keywords */
export const fixKeywordTypos: RewriteRule = {
	name: "FIX_KEYWORD_TYPOS",
	apply: (sql) =>
		outsideLiterals(sql, code => KEYWORD_TYPOS.reduce((current, [pattern, fix]) => current.replace(pattern, fix), code)),
}

/** 2. Multi-word table names written bare, with underscores or run together */
export const quoteMultiwordTables: RewriteRule = {
	name: "QUOTE_MULTIWORD_TABLE",
	apply: (sql) =>
		outsideLiterals(sql, code => {
			let result = code
			for (const table of MULTIWORD_TABLES) {
				const words = table.split(/\s+/).map(escapeRegex).join("(?:\\s+|_)?")
				const pattern = new RegExp(`(?<![\\w."'\`[])${words}(?![\\w"'\`\\]])`, "gi")
				result = result.replace(pattern, `"${table}"`)
			}
			return result
		}),
}

/** 3. Placeholder column tokens rewritten to the canonical column */
export const canonicalColumnReferences: RewriteRule = {
	name: "CANONICAL_COLUMN_REFERENCE",
	apply: (sql) =>
		outsideLiterals(sql, code => {
			let result = code
			for (const [placeholder, column] of Object.entries(PLACEHOLDER_COLUMNS)) {
				result = result.replace(new RegExp(`(?<![\\w"'])${escapeRegex(placeholder)}(?![\\w"'])`, "gi"), column)
			}
			return result
		}),
}

/**
 * 4. A date range inside one calendar month becomes a year-month equality:
 *   col BETWEEN '1997-06-01' AND '1997-06-30'  →  strftime('%Y-%m', col) = '1997-06'
 *   col >= '1997-06-01' AND col <= '1997-06-30'  →  (same)
 */
export const collapseSingleMonthRange: RewriteRule = {
	name: "COLLAPSE_SINGLE_MONTH_RANGE",
	apply: (sql) => {
		const between = new RegExp(`${COLUMN_REF}\\s+BETWEEN\\s+${DATE_LITERAL}\\s+AND\\s+${DATE_LITERAL}`, "gi")
		// NOT binds to the first comparison only, so a negated pair is not one range
		const comparison = new RegExp(
			`(?<!\\bNOT\\s+)${COLUMN_REF}\\s*>=?\\s*${DATE_LITERAL}\\s+AND\\s+${COLUMN_REF}\\s*<=?\\s*${DATE_LITERAL}`,
			"gi",
		)

		let result = sql.replace(between, (match, column: string, startMonth: string, endMonth: string) =>
			startMonth === endMonth ? `strftime('%Y-%m', ${column}) = '${startMonth}'` : match,
		)
		result = result.replace(
			comparison,
			(match, column: string, startMonth: string, endColumn: string, endMonth: string) =>
				startMonth === endMonth && column.toLowerCase() === endColumn.toLowerCase()
					? `strftime('%Y-%m', ${column}) = '${startMonth}'`
					: match,
		)
		return result
	},
}

/** 5. COALESCE/IFNULL(discount, -1) → COALESCE/IFNULL(discount, 0) */
export const discountDefaultZero: RewriteRule = {
	name: "DISCOUNT_DEFAULT_ZERO",
	apply: (sql) =>
		sql.replace(
			/\b(COALESCE|IFNULL)\s*\(\s*((?:\w+\.)?\w*discount\w*)\s*,\s*-\s*1(?:\.0+)?\s*\)/gi,
			"$1($2, 0)",
		),
}

/**
 * 6. `SUM(...) / COUNT(DISTINCT OrderID)` under a non-average alias is a total
 * that was turned into an average; drop the divisor. Left alone when the
 * alias or the planned KPI names an average.
 */
export const removeTotalDivision: RewriteRule = {
	name: "REMOVE_TOTAL_DIVISION",
	apply: (sql, ctx) => {
		const kpi = ctx.constraints?.kpi_formula
		if (kpi && AVERAGE_KPI.test(kpi)) return sql

		return sql.replace(
			/\)\s*\/\s*COUNT\s*\(\s*DISTINCT\s+(?:\w+\.)?"?OrderID"?\s*\)/gi,
			(match: string, offset: number, whole: string) => {
				const alias = aliasAfter(whole, offset + match.length)
				return alias && AVERAGE_ALIAS.test(alias) ? match : ")"
			},
		)
	},
}

const FILTER_VALUE = `(?:'(?:[^']|'')*'|-?\\d+(?:\\.\\d+)?|\\([^()]*\\))`
const FILTER_OPERATOR = `(?:\\s*(?:=|<>|!=|<=|>=|<|>)\\s*|\\s+(?:NOT\\s+)?(?:LIKE|IN)\\s*)`
const FILTER_CONDITION = `([A-Za-z_]\\w*)\\.\\w+${FILTER_OPERATOR}${FILTER_VALUE}`

/** 7. Filters on a qualifier no FROM/JOIN introduced */
export const stripUnjoinedFilters: RewriteRule = {
	name: "STRIP_UNJOINED_FILTERS",
	apply: (sql) => {
		const sources = collectSources(sql)
		const unjoined = (qualifier: string) => !sources.has(qualifier.toLowerCase())

		const trailing = new RegExp(`\\s+AND\\s+${FILTER_CONDITION}`, "gi")
		const leading = new RegExp(`\\bWHERE\\s+${FILTER_CONDITION}\\s+AND\\s+`, "gi")
		const only = new RegExp(
			`\\s*\\bWHERE\\s+${FILTER_CONDITION}(?=\\s*(?:\\bGROUP\\b|\\bORDER\\b|\\bLIMIT\\b|\\bHAVING\\b|\\)|;|$))`,
			"gi",
		)

		let result = sql
		for (let pass = 0; pass < 10; pass++) {
			const before = result
			result = result.replace(trailing, (match, qualifier: string) => (unjoined(qualifier) ? "" : match))
			result = result.replace(leading, (match, qualifier: string) => (unjoined(qualifier) ? "WHERE " : match))
			result = result.replace(only, (match, qualifier: string) => (unjoined(qualifier) ? "" : match))
			if (result === before) break
		}
		return result
	},
}

// ============================================================================
// Rule sets
// ============================================================================

/** Typo fixes shared by the normalizer and the repair fast path */
export const TYPO_RULES: readonly RewriteRule[] = [
	fixKeywordTypos,
	quoteMultiwordTables,
	canonicalColumnReferences,
]

/** Full normalization, in order. Month collapse runs before filter cleanup. */
export const NORMALIZE_RULES: readonly RewriteRule[] = [
	...TYPO_RULES,
	collapseSingleMonthRange,
	discountDefaultZero,
	removeTotalDivision,
	stripUnjoinedFilters,
]

// ============================================================================
// Main Functions
// ============================================================================

export function applyRules(sql: string, rules: readonly RewriteRule[], ctx: NormalizeContext = {}): NormalizeResult {
	if (!sql || !sql.trim()) {
		return { sql, applied: [], changed: false }
	}

	const applied: string[] = []
	let currentSQL = sql
	for (const rule of rules) {
		const next = rule.apply(currentSQL, ctx)
		if (next !== currentSQL) {
			currentSQL = next
			applied.push(rule.name)
		}
	}

	return { sql: currentSQL, applied, changed: applied.length > 0 }
}

/**
 * Apply every normalization rule to a generated query.
 * Already-clean SQL passes through unchanged.
 */
export function normalizeSQL(sql: string, ctx: NormalizeContext = {}): NormalizeResult {
	return applyRules(sql, NORMALIZE_RULES, ctx)
}

/** Keyword typos, multi-word table quoting and placeholder columns only. */
export function fixTypos(sql: string): NormalizeResult {
	return applyRules(sql, TYPO_RULES)
}
