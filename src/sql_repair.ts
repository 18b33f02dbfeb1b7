/**
 * SQL Repair
 *
 * Rewrites a failed query using the engine's error message. The typo-fix
 * rules run first; when they change the text and the error is a syntax or
 * name-resolution failure, the fixed text is used without asking the
 * oracle. Otherwise the oracle repairs the query and the typo fixes run
 * over its reply.
 */

import type { PipelineContext } from "./config.js"
import { invokeStage } from "./oracle_client.js"
import { fixTypos, stripCodeFences } from "./sql_normalize.js"

export type RepairPath = "deterministic" | "oracle" | "unchanged"

export interface RepairOutcome {
	sql: string
	path: RepairPath
	/** Typo-fix rules that changed the query */
	applied: string[]
}

export interface RepairInput {
	sql: string
	error: string
	schema: string
}

/** SQLite messages for parse errors and unresolved tables or columns */
const SYNTAX_OR_NAME_ERROR = /no such|syntax error|near "|unrecognized token|incomplete input|ambiguous column/i

export function isSyntaxOrNameError(message: string): boolean {
	return SYNTAX_OR_NAME_ERROR.test(message)
}

export async function repairSQL(input: RepairInput, ctx: PipelineContext): Promise<RepairOutcome> {
	const fixed = fixTypos(input.sql)
	if (fixed.changed && isSyntaxOrNameError(input.error)) {
		ctx.logger.debug("Repaired by typo fixes", { run_id: ctx.run_id, applied: fixed.applied })
		return { sql: fixed.sql, path: "deterministic", applied: fixed.applied }
	}

	const reply = await invokeStage(ctx, "repair_sql", {
		original_query: input.sql,
		error_message: input.error,
		schema: input.schema,
	})
	const repaired = reply.ok ? stripCodeFences(reply.text) : ""
	if (!repaired) {
		return { sql: fixed.sql, path: "unchanged", applied: fixed.applied }
	}

	const cleaned = fixTypos(repaired)
	return { sql: cleaned.sql, path: "oracle", applied: cleaned.applied }
}
