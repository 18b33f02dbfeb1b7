/**
 * Query Generator
 *
 * Asks the oracle for a SQLite query, unwraps code fences and runs the
 * deterministic normalizer over the result.
 */

import type { CandidateQuery, Constraints, PipelineContext } from "./config.js"
import { invokeStage } from "./oracle_client.js"
import { normalizeSQL, stripCodeFences } from "./sql_normalize.js"

export interface GenerateInput {
	question: string
	schema: string
	constraints: Constraints
	formatHint: string
}

export interface GenerateOptions {
	/** Run the normalization rules (on by default) */
	normalize?: boolean
}

export interface GenerationResult {
	candidate: CandidateQuery
	/** Normalization rules that changed the query */
	applied: string[]
}

export async function generateSQL(
	input: GenerateInput,
	ctx: PipelineContext,
	options: GenerateOptions = {},
): Promise<GenerationResult> {
	const reply = await invokeStage(ctx, "generate_sql", {
		question: input.question,
		schema: input.schema,
		constraints: JSON.stringify(input.constraints),
		format_hint: input.formatHint,
	})

	// An empty query fails execution and goes through repair like any other
	const raw = reply.ok ? stripCodeFences(reply.text) : ""
	if (options.normalize === false) {
		return { candidate: { sql: raw, repair_count: 0 }, applied: [] }
	}

	const normalized = normalizeSQL(raw, { constraints: input.constraints })
	if (normalized.changed) {
		ctx.logger.debug("Generated SQL normalized", { run_id: ctx.run_id, applied: normalized.applied })
	}
	return { candidate: { sql: normalized.sql, repair_count: 0 }, applied: normalized.applied }
}
