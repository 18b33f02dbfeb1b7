/**
 * Executor
 *
 * Runs the current candidate query and reports a fresh ExecutionResult.
 * On success the tables referenced by the query text are recorded for
 * citations.
 */

import type { ExecutionResult, PipelineContext } from "./config.js"
import type { RelationalEngine } from "./sqlite_engine.js"

/** Query tokens that name a known table under a different spelling */
const TABLE_ALIASES: Record<string, string> = {
	order_items: "Order Details",
	orderdetails: "Order Details",
	order_details: "Order Details",
}

function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Canonical names of known tables that appear as whole words in the query.
 * Matching ignores case and quoting; multi-word names match across any
 * whitespace. Sorted, no duplicates.
 */
export function extractTablesReferenced(sql: string, knownTables: readonly string[]): string[] {
	const found = new Set<string>()

	for (const table of knownTables) {
		const words = table.split(/\s+/).map(escapeRegex).join("\\s+")
		if (new RegExp(`(?<![\\w.])${words}(?!\\w)`, "i").test(sql)) {
			found.add(table)
		}
	}
	for (const [alias, table] of Object.entries(TABLE_ALIASES)) {
		if (knownTables.includes(table) && new RegExp(`(?<![\\w.])${alias}(?!\\w)`, "i").test(sql)) {
			found.add(table)
		}
	}

	return [...found].sort()
}

export async function executeQuery(
	engine: RelationalEngine,
	sql: string,
	knownTables: readonly string[],
	ctx: PipelineContext,
): Promise<ExecutionResult> {
	const startTime = Date.now()
	const result = await engine.execute(sql)
	const latency = Date.now() - startTime

	if (!result.success) {
		ctx.logger.debug("Execution failed", { run_id: ctx.run_id, error: result.error, latency_ms: latency })
		return { ...result, tables_referenced: [] }
	}

	ctx.logger.debug("Execution succeeded", { run_id: ctx.run_id, rows: result.rows.length, latency_ms: latency })
	return { ...result, tables_referenced: extractTablesReferenced(sql, knownTables) }
}
