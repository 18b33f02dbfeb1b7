/**
 * Constraint Planner
 *
 * Turns a question plus retrieved passages into structured filters. The
 * oracle is asked for JSON; when the reply does not parse, a keyword scan of
 * the reply text fills in what it can. The result is always fully shaped.
 */

import {
	emptyConstraints,
	isRecord,
	type Constraints,
	type DateRange,
	type PipelineContext,
	type RetrievedPassage,
} from "./config.js"
import { invokeStage } from "./oracle_client.js"
import { stripCodeFences } from "./sql_normalize.js"

const MONTHS = [
	"january", "february", "march", "april", "may", "june",
	"july", "august", "september", "october", "november", "december",
]

/** Northwind product categories recognised by the keyword fallback */
const KNOWN_CATEGORIES = [
	"Beverages", "Condiments", "Confections", "Dairy Products",
	"Grains/Cereals", "Meat/Poultry", "Produce", "Seafood",
]

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
	return n < 10 ? `0${n}` : String(n)
}

/** First and last calendar day of a month (month is 1-based). */
export function monthRange(year: number, month: number): DateRange {
	const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate()
	return {
		start: `${year}-${pad2(month)}-01`,
		end: `${year}-${pad2(month)}-${pad2(lastDay)}`,
	}
}

function toStringList(value: unknown): string[] {
	if (typeof value === "string") return value.trim() ? [value.trim()] : []
	if (!Array.isArray(value)) return []
	const items = value.filter((item): item is string => typeof item === "string").map(item => item.trim())
	return [...new Set(items.filter(Boolean))]
}

function toDateRange(value: unknown): DateRange | null {
	if (!isRecord(value)) return null
	const { start, end } = value
	if (typeof start !== "string" || typeof end !== "string") return null
	return { start, end }
}

export function formatPassages(passages: RetrievedPassage[]): string {
	return passages.map(p => `[${p.id}] ${p.text}`).join("\n\n")
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a JSON constraints reply. Returns null when the text is not a JSON
 * object; unknown keys are dropped and missing ones take their empty value.
 */
export function parseConstraints(raw: string): Constraints | null {
	const text = stripCodeFences(raw)
	let parsed: unknown
	try {
		parsed = JSON.parse(text)
	} catch {
		// Small models wrap the object in prose; try the outermost braces
		const start = text.indexOf("{")
		const end = text.lastIndexOf("}")
		if (start < 0 || end <= start) return null
		try {
			parsed = JSON.parse(text.slice(start, end + 1))
		} catch {
			return null
		}
	}
	if (!isRecord(parsed)) return null

	return {
		date_range: toDateRange(parsed.date_range),
		kpi_formula: typeof parsed.kpi_formula === "string" && parsed.kpi_formula.trim() ? parsed.kpi_formula.trim() : null,
		categories: toStringList(parsed.categories),
		entities: toStringList(parsed.entities),
	}
}

/**
 * Deterministic fallback: scan free text for year-month tokens, month names,
 * KPI names and known categories. Fields with no match keep their empty value.
 */
export function keywordConstraints(raw: string): Constraints {
	const constraints = emptyConstraints()
	const lower = raw.toLowerCase()

	const isoMonth = raw.match(/\b(\d{4})-(0[1-9]|1[0-2])\b/)
	if (isoMonth) {
		constraints.date_range = monthRange(Number(isoMonth[1]), Number(isoMonth[2]))
	} else {
		const named = lower.match(new RegExp(`\\b(${MONTHS.join("|")})\\s+(\\d{4})\\b`))
		if (named) {
			constraints.date_range = monthRange(Number(named[2]), MONTHS.indexOf(named[1]) + 1)
		}
	}

	if (/\baov\b/.test(lower) || lower.includes("average order value")) {
		constraints.kpi_formula = "AOV"
	} else if (lower.includes("margin")) {
		constraints.kpi_formula = "GrossMargin"
	}

	constraints.categories = KNOWN_CATEGORIES.filter(category => lower.includes(category.toLowerCase()))
	return constraints
}

// ============================================================================
// Stage
// ============================================================================

export interface PlannerInput {
	question: string
	passages: RetrievedPassage[]
	schema: string
}

export async function extractConstraints(input: PlannerInput, ctx: PipelineContext): Promise<Constraints> {
	const reply = await invokeStage(ctx, "constraints", {
		question: input.question,
		documents: input.passages.length > 0 ? formatPassages(input.passages) : "No docs",
		schema: input.schema,
	})
	if (!reply.ok) return emptyConstraints()

	const parsed = parseConstraints(reply.text)
	if (parsed) return parsed

	ctx.logger.debug("Constraints reply was not JSON, using keyword fallback", { run_id: ctx.run_id })
	return keywordConstraints(reply.text)
}
