/**
 * Answer Coercion
 *
 * Coerces a final answer into the caller's format hint. Strategies are
 * tried in order and each either produces a value or reports that it does
 * not apply:
 *   1. result rows    (execution succeeded and returned rows)
 *   2. structured     (the oracle's answer parses as JSON of the right shape)
 *   3. number in text (numeric hints; a fixed fallback when there is none)
 *   4. raw text
 */

import { isRecord, type CellValue, type ExecutionResult, type JsonRecord, type JsonValue, SYNTHESIS_LIMITS } from "./config.js"
import { stripCodeFences } from "./sql_normalize.js"

// ============================================================================
// Types
// ============================================================================

export type HintKind = "int" | "float" | "list" | "object" | "text" | "auto"

export interface CoercionInput {
	hint: HintKind
	execution: ExecutionResult | null
	answerText: string
}

export type CoercionOutcome =
	| { applicable: true; value: JsonValue }
	| { applicable: false }

export interface CoercionStrategy {
	name: string
	coerce: (input: CoercionInput) => CoercionOutcome
}

/**
 * Value for numeric hints when the answer text holds no number. Zero for
 * every question; no domain constant stands in for a missing answer.
 */
export const NUMERIC_FALLBACK = 0

const NOT_APPLICABLE: CoercionOutcome = { applicable: false }

// ============================================================================
// Helpers
// ============================================================================

/**
 * `int`, `float`, `list[...]`, a `{...}` record hint, empty (auto) or
 * anything else (free text).
 */
export function parseFormatHint(hint: string): HintKind {
	const normalized = hint.trim().toLowerCase()
	if (normalized === "") return "auto"
	if (normalized === "int" || normalized === "integer") return "int"
	if (normalized === "float" || normalized === "number") return "float"
	if (normalized.startsWith("list[")) return "list"
	if (normalized.startsWith("{")) return "object"
	return "text"
}

/**
 * An empty hint takes its shape from the result: two or more columns give a
 * list of records, a single numeric cell gives int or float.
 */
export function resolveHint(hint: HintKind, execution: ExecutionResult | null): HintKind {
	if (hint !== "auto") return hint
	if (!execution?.success || execution.rows.length === 0) return "text"
	if (execution.column_names.length >= 2) return "list"
	const cell = execution.rows[0][0]
	if (execution.rows.length === 1 && typeof cell === "number") {
		return Number.isInteger(cell) ? "int" : "float"
	}
	return "text"
}

export function round2(value: number): number {
	return (Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100
}

function toNumber(cell: CellValue): number {
	if (typeof cell === "number") return cell
	if (typeof cell === "string" && cell.trim() !== "") return Number(cell)
	return NaN
}

function roundedCell(cell: CellValue): JsonValue {
	if (cell === null) return 0
	const n = toNumber(cell)
	return Number.isNaN(n) ? cell : round2(n)
}

function toRecord(row: CellValue[], columns: string[]): JsonRecord {
	return {
		[columns[0]]: row[0],
		[columns[1]]: roundedCell(row[1]),
	}
}

function toJsonValue(value: unknown): JsonValue | undefined {
	if (value === null || typeof value === "string" || typeof value === "boolean") return value
	if (typeof value === "number") return Number.isFinite(value) ? value : undefined
	if (Array.isArray(value)) {
		const items: JsonValue[] = []
		for (const item of value) {
			const converted = toJsonValue(item)
			if (converted === undefined) return undefined
			items.push(converted)
		}
		return items
	}
	if (isRecord(value)) {
		const record: JsonRecord = {}
		for (const [key, item] of Object.entries(value)) {
			const converted = toJsonValue(item)
			if (converted === undefined) return undefined
			record[key] = converted
		}
		return record
	}
	return undefined
}

// ============================================================================
// Strategies
// ============================================================================

export const fromResultRows: CoercionStrategy = {
	name: "result_rows",
	coerce: ({ hint, execution }) => {
		if (!execution?.success || execution.rows.length === 0) return NOT_APPLICABLE
		const { rows, column_names: columns } = execution
		const first = rows[0][0]

		switch (hint) {
			case "int": {
				if (first === null) return { applicable: true, value: 0 }
				const n = toNumber(first)
				return Number.isNaN(n) ? NOT_APPLICABLE : { applicable: true, value: Math.trunc(n) }
			}
			case "float": {
				if (first === null) return { applicable: true, value: 0 }
				const n = toNumber(first)
				return Number.isNaN(n) ? NOT_APPLICABLE : { applicable: true, value: round2(n) }
			}
			case "list":
				if (columns.length < 2) return NOT_APPLICABLE
				return {
					applicable: true,
					value: rows.slice(0, SYNTHESIS_LIMITS.maxListRecords).map(row => toRecord(row, columns)),
				}
			case "object":
				if (columns.length < 2) return NOT_APPLICABLE
				return { applicable: true, value: toRecord(rows[0], columns) }
			default:
				return NOT_APPLICABLE
		}
	},
}

export const fromStructuredReply: CoercionStrategy = {
	name: "structured_reply",
	coerce: ({ hint, answerText }) => {
		let parsed: JsonValue | undefined
		try {
			parsed = toJsonValue(JSON.parse(stripCodeFences(answerText)))
		} catch {
			return NOT_APPLICABLE
		}
		if (parsed === undefined) return NOT_APPLICABLE

		switch (hint) {
			case "int":
				return typeof parsed === "number" ? { applicable: true, value: Math.trunc(parsed) } : NOT_APPLICABLE
			case "float":
				return typeof parsed === "number" ? { applicable: true, value: round2(parsed) } : NOT_APPLICABLE
			case "list":
				return Array.isArray(parsed)
					? { applicable: true, value: parsed.slice(0, SYNTHESIS_LIMITS.maxListRecords) }
					: NOT_APPLICABLE
			case "object":
				return isRecord(parsed) ? { applicable: true, value: parsed } : NOT_APPLICABLE
			default:
				return { applicable: true, value: parsed }
		}
	},
}

export const fromNumberInText: CoercionStrategy = {
	name: "number_in_text",
	coerce: ({ hint, answerText }) => {
		if (hint !== "int" && hint !== "float") return NOT_APPLICABLE
		// 1,234.56 → 1234.56
		const text = answerText.replace(/(\d),(?=\d{3}(?!\d))/g, "$1")

		if (hint === "int") {
			const match = text.match(/-?\d+/)
			return { applicable: true, value: match ? parseInt(match[0], 10) : NUMERIC_FALLBACK }
		}
		const match = text.match(/-?\d+(?:\.\d+)?/)
		return { applicable: true, value: match ? round2(parseFloat(match[0])) : NUMERIC_FALLBACK }
	},
}

export const fromRawText: CoercionStrategy = {
	name: "raw_text",
	coerce: ({ answerText }) => ({ applicable: true, value: answerText.trim() }),
}

export const COERCION_STRATEGIES: readonly CoercionStrategy[] = [
	fromResultRows,
	fromStructuredReply,
	fromNumberInText,
	fromRawText,
]

// ============================================================================
// Main Function
// ============================================================================

export function coerceAnswer(
	formatHint: string,
	execution: ExecutionResult | null,
	answerText: string,
): { value: JsonValue; strategy: string } {
	const input: CoercionInput = {
		hint: resolveHint(parseFormatHint(formatHint), execution),
		execution,
		answerText,
	}
	for (const strategy of COERCION_STRATEGIES) {
		const outcome = strategy.coerce(input)
		if (outcome.applicable) return { value: outcome.value, strategy: strategy.name }
	}
	return { value: answerText.trim(), strategy: fromRawText.name }
}
