/**
 * Router
 *
 * Classifies a question into one of three strategies: rag (documents only),
 * sql (database only) or hybrid (both). Anything the oracle says that does
 * not clearly name a strategy resolves to hybrid.
 */

import type { PipelineContext, RouteDecision } from "./config.js"
import { invokeStage } from "./oracle_client.js"

/**
 * Map a free-text classification reply onto a route.
 * Checked in order: hybrid/both, sql, rag, else hybrid.
 */
export function normalizeRoute(raw: string): RouteDecision {
	const text = raw.toLowerCase().trim()
	if (text.includes("hybrid") || text.includes("both")) return "hybrid"
	if (text.includes("sql")) return "sql"
	if (text.includes("rag")) return "rag"
	return "hybrid"
}

export async function routeQuestion(question: string, ctx: PipelineContext): Promise<RouteDecision> {
	const reply = await invokeStage(ctx, "route", { question })
	if (!reply.ok) return "hybrid"

	const route = normalizeRoute(reply.text)
	ctx.logger.debug("Question routed", { run_id: ctx.run_id, route, raw: reply.text.slice(0, 80) })
	return route
}
