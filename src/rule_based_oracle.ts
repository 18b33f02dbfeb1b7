/**
 * Rule-Based Oracle
 *
 * Deterministic stand-in for the language model, for offline runs and
 * demos. Each stage answers from keywords in the prompt fields: routes by
 * question vocabulary, constraints from the keyword scanner, SQL from a
 * handful of Northwind query templates.
 */

import { emptyConstraints, type Constraints, type Oracle, type OracleRequest } from "./config.js"
import { keywordConstraints, parseConstraints } from "./planner.js"

const DOC_ONLY_TERMS = /\b(polic(?:y|ies)|returns?|definitions?|defined|according to)\b/
const HYBRID_TERMS = /\b(during|campaign|calendar|kpi|per the|using the)\b/

const REVENUE = "SUM(od.UnitPrice * od.Quantity * (1 - od.Discount))"
const MARGIN = "SUM((od.UnitPrice - 0.7 * od.UnitPrice) * od.Quantity * (1 - od.Discount))"

// ============================================================================
// Stages
// ============================================================================

export function ruleBasedRoute(question: string): string {
	const q = question.toLowerCase()
	if (HYBRID_TERMS.test(q)) return "hybrid"
	if (DOC_ONLY_TERMS.test(q)) return "rag"
	return "sql"
}

/**
 * Keywords from the question win; dates and KPI names found only in the
 * documents fill the gaps.
 */
export function ruleBasedConstraints(question: string, documents: string): Constraints {
	const fromQuestion = keywordConstraints(question)
	const fromDocs = documents === "No docs" ? emptyConstraints() : keywordConstraints(documents)
	return {
		date_range: fromQuestion.date_range ?? fromDocs.date_range,
		kpi_formula: fromQuestion.kpi_formula ?? fromDocs.kpi_formula,
		categories: fromQuestion.categories,
		entities: fromQuestion.entities,
	}
}

function dateFilter(constraints: Constraints): string | null {
	const range = constraints.date_range
	if (!range) return null
	return `o.OrderDate BETWEEN '${range.start}' AND '${range.end} 23:59:59'`
}

function where(filters: Array<string | null>): string {
	const present = filters.filter((f): f is string => f !== null)
	return present.length > 0 ? ` WHERE ${present.join(" AND ")}` : ""
}

function categoryFilter(constraints: Constraints): string | null {
	const category = constraints.categories[0]
	return category ? `c.CategoryName = '${category.replace(/'/g, "''")}'` : null
}

export function ruleBasedSQL(question: string, constraints: Constraints): string {
	const q = question.toLowerCase()
	const date = dateFilter(constraints)

	const topProducts = q.match(/top\s+(\d+)\s+products?/)
	if (topProducts && q.includes("revenue")) {
		return (
			`SELECT p.ProductName, ROUND(${REVENUE}, 2) AS Revenue ` +
			`FROM Products p JOIN "Order Details" od ON p.ProductID = od.ProductID` +
			(date ? ` JOIN Orders o ON o.OrderID = od.OrderID${where([date])}` : "") +
			` GROUP BY p.ProductName ORDER BY Revenue DESC LIMIT ${Number(topProducts[1])}`
		)
	}

	if (constraints.kpi_formula === "AOV" || /average order value|\baov\b/.test(q)) {
		return (
			`SELECT ROUND(${REVENUE} / COUNT(DISTINCT o.OrderID), 2) AS AOV ` +
			`FROM Orders o JOIN "Order Details" od ON o.OrderID = od.OrderID` +
			where([date])
		)
	}

	if (q.includes("margin") && q.includes("customer")) {
		return (
			`SELECT cu.CompanyName, ROUND(${MARGIN}, 2) AS GrossMargin ` +
			`FROM Customers cu JOIN Orders o ON cu.CustomerID = o.CustomerID ` +
			`JOIN "Order Details" od ON o.OrderID = od.OrderID` +
			where([date]) +
			` GROUP BY cu.CompanyName ORDER BY GrossMargin DESC LIMIT 1`
		)
	}

	if (q.includes("category") || constraints.categories.length > 0) {
		const measure = /quantity|units/.test(q) ? "SUM(od.Quantity)" : `ROUND(${REVENUE}, 2)`
		const alias = /quantity|units/.test(q) ? "TotalQuantity" : "Revenue"
		return (
			`SELECT c.CategoryName, ${measure} AS ${alias} ` +
			`FROM Categories c JOIN Products p ON c.CategoryID = p.CategoryID ` +
			`JOIN "Order Details" od ON p.ProductID = od.ProductID ` +
			`JOIN Orders o ON o.OrderID = od.OrderID` +
			where([categoryFilter(constraints), date]) +
			` GROUP BY c.CategoryName ORDER BY ${alias} DESC LIMIT 1`
		)
	}

	return `SELECT COUNT(*) AS OrderCount FROM Orders o${where([date])}`
}

/**
 * Answer from the first result cell, or from the document line sharing
 * the most words with the question.
 */
export function ruleBasedSynthesis(question: string, sqlResults: string, documents: string): string {
	const rows = sqlResults.match(/Rows: (\[.*\])$/s)
	if (rows) {
		return JSON.stringify({ answer: rows[1], reason: "Computed from the SQL result." })
	}

	if (documents && documents !== "No docs") {
		const words = new Set(question.toLowerCase().match(/[a-z]{4,}/g) ?? [])
		let best = { line: "", source: "", overlap: -1 }
		for (const entry of documents.split("\n")) {
			const [source, ...rest] = entry.split(": ")
			const text = rest.join(": ")
			for (const line of text.split(/(?<=\.)\s+|\s+-\s+/)) {
				const overlap = (line.toLowerCase().match(/[a-z]{4,}/g) ?? []).filter(w => words.has(w)).length
				if (overlap > best.overlap) best = { line: line.trim(), source, overlap }
			}
		}
		return JSON.stringify({ answer: best.line, reason: `Taken from ${best.source}.` })
	}

	return JSON.stringify({ answer: "", reason: "No supporting data was found." })
}

// ============================================================================
// Oracle
// ============================================================================

export class RuleBasedOracle implements Oracle {
	async invoke(request: OracleRequest): Promise<string> {
		const field = (name: string) => request.fields[name] ?? ""

		switch (request.stage) {
			case "route":
				return ruleBasedRoute(field("question"))
			case "constraints":
				return JSON.stringify(ruleBasedConstraints(field("question"), field("documents")))
			case "generate_sql": {
				const constraints = parseConstraints(field("constraints")) ?? emptyConstraints()
				return ruleBasedSQL(field("question"), constraints)
			}
			case "repair_sql":
				return field("original_query")
			case "synthesize":
				return ruleBasedSynthesis(field("question"), field("sql_results"), field("documents"))
		}
	}
}
