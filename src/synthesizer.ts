/**
 * Synthesizer
 *
 * Builds the final answer from the latest execution result and the
 * retrieved passages. The oracle writes the answer text and a short reason;
 * everything after that (explanation truncation, format coercion,
 * confidence, citations) is deterministic.
 */

import {
	CONFIDENCE_CONFIG,
	SYNTHESIS_LIMITS,
	isRecord,
	type ExecutionResult,
	type FinalAnswer,
	type PipelineContext,
	type RetrievedPassage,
} from "./config.js"
import { coerceAnswer } from "./answer_coercion.js"
import { invokeStage } from "./oracle_client.js"
import { stripCodeFences } from "./sql_normalize.js"

export interface SynthesisInput {
	question: string
	formatHint: string
	/** Latest execution result, null when the route skipped the database */
	execution: ExecutionResult | null
	passages: RetrievedPassage[]
	repairCount: number
}

export interface SynthesisReply {
	answer: string
	reason: string
}

// ============================================================================
// Prompt context
// ============================================================================

export function summarizeRows(execution: ExecutionResult | null): string {
	if (!execution) return "No data"
	if (!execution.success) return `No data (error: ${execution.error ?? "unknown"})`
	const rows = execution.rows.slice(0, SYNTHESIS_LIMITS.maxRows)
	return `Cols: ${JSON.stringify(execution.column_names)} Rows: ${JSON.stringify(rows)}`
}

export function summarizePassages(passages: RetrievedPassage[]): string {
	if (passages.length === 0) return "No docs"
	return passages
		.slice(0, SYNTHESIS_LIMITS.maxPassages)
		.map(p => `${p.id}: ${p.text.replace(/\s+/g, " ").trim().slice(0, SYNTHESIS_LIMITS.passageChars)}`)
		.join("\n")
}

// ============================================================================
// Reply handling
// ============================================================================

function asText(value: unknown): string {
	if (typeof value === "string") return value
	if (value === undefined || value === null) return ""
	return JSON.stringify(value)
}

/**
 * Accepts `{"answer": ..., "reason": ...}`, `Answer:` / `Reason:` lines,
 * or plain text (taken as the answer).
 */
export function parseSynthesisReply(raw: string): SynthesisReply {
	const text = stripCodeFences(raw)
	if (!text) return { answer: "", reason: "" }

	const start = text.indexOf("{")
	const end = text.lastIndexOf("}")
	if (start >= 0 && end > start) {
		try {
			const parsed: unknown = JSON.parse(text.slice(start, end + 1))
			if (isRecord(parsed) && "answer" in parsed) {
				return { answer: asText(parsed.answer), reason: asText(parsed.reason) }
			}
		} catch {
			// not JSON, try labelled lines
		}
	}

	const answerLine = text.match(/^\s*answer\s*:\s*(.+)$/im)
	const reasonLine = text.match(/^\s*reason\s*:\s*(.+)$/im)
	if (answerLine) {
		return { answer: answerLine[1].trim(), reason: reasonLine ? reasonLine[1].trim() : "" }
	}
	return { answer: text, reason: "" }
}

/**
 * Keep the first two sentences, then cap the length with an ellipsis.
 */
export function truncateExplanation(reason: string): string {
	const text = reason.trim().replace(/\s+/g, " ")
	if (!text) return ""

	const sentences = text.split(". ").filter(Boolean)
	let explanation = sentences.slice(0, SYNTHESIS_LIMITS.maxSentences).join(". ")
	if (!/[.!?]$/.test(explanation)) explanation += "."

	const max = SYNTHESIS_LIMITS.maxExplanationChars
	if (explanation.length > max) {
		explanation = `${explanation.slice(0, max - 3)}...`
	}
	return explanation
}

export function computeConfidence(
	execution: ExecutionResult | null,
	passages: RetrievedPassage[],
	repairCount: number,
): number {
	let confidence = CONFIDENCE_CONFIG.base
	if (execution?.success) confidence += CONFIDENCE_CONFIG.executionBonus
	if (passages.length > 0) {
		const average = passages.reduce((sum, p) => sum + p.relevance_score, 0) / passages.length
		confidence += average * CONFIDENCE_CONFIG.retrievalWeight
	}
	confidence -= repairCount * CONFIDENCE_CONFIG.penaltyPerRepair

	const clamped = Math.min(1, Math.max(0, confidence))
	return Math.round(clamped * 10000) / 10000
}

/** Tables of a successful execution (sorted), then passage ids in order */
export function collectCitations(execution: ExecutionResult | null, passages: RetrievedPassage[]): string[] {
	const tables = execution?.success ? [...execution.tables_referenced].sort() : []
	return [...new Set([...tables, ...passages.map(p => p.id)])]
}

// ============================================================================
// Stage
// ============================================================================

export async function synthesizeAnswer(input: SynthesisInput, ctx: PipelineContext): Promise<FinalAnswer> {
	const reply = await invokeStage(ctx, "synthesize", {
		question: input.question,
		format_hint: input.formatHint,
		sql_results: summarizeRows(input.execution),
		documents: summarizePassages(input.passages),
	})
	const parsed = reply.ok ? parseSynthesisReply(reply.text) : { answer: "", reason: "" }

	const coerced = coerceAnswer(input.formatHint, input.execution, parsed.answer)
	ctx.logger.debug("Answer coerced", { run_id: ctx.run_id, strategy: coerced.strategy })

	return {
		value: coerced.value,
		explanation: truncateExplanation(parsed.reason),
		confidence: computeConfidence(input.execution, input.passages, input.repairCount),
		citations: collectCitations(input.execution, input.passages),
	}
}
