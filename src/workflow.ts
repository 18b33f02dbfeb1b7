/**
 * Hybrid Agent Workflow
 *
 * Sequences the pipeline stages for one question as an explicit state
 * machine. Each state handler mutates the run state it is handed and
 * returns the next transition:
 *
 *   ROUTE → (rag|hybrid) RETRIEVE → PLAN
 *         → (sql)        PLAN
 *   PLAN  → (rag) SYNTHESIZE, otherwise GENERATE → EXECUTE
 *   EXECUTE → SUCCESS | REPAIR → EXECUTE | EXHAUSTED
 *   SUCCESS | EXHAUSTED → SYNTHESIZE → finish
 *
 * A run always ends in SYNTHESIZE and produces an answer. Run state is
 * created per call; the retriever, engine and cached schema text are the
 * only things shared between concurrent runs, and they are read-only.
 */

import { v4 as uuidv4 } from "uuid"
import {
	REPAIR_CONFIG,
	DEFAULTS,
	emptyConstraints,
	errorMessage,
	type CandidateQuery,
	type Constraints,
	type ExecutionResult,
	type FinalAnswer,
	type Logger,
	type Oracle,
	type PipelineContext,
	type Question,
	type RetrievedPassage,
	type RouteDecision,
	type RunResponse,
} from "./config.js"
import { executeQuery } from "./executor.js"
import { silentLogger } from "./logger.js"
import { extractConstraints } from "./planner.js"
import type { PassageRetriever } from "./retriever.js"
import { routeQuestion } from "./router.js"
import { generateSQL } from "./sql_generator.js"
import { repairSQL } from "./sql_repair.js"
import type { RelationalEngine } from "./sqlite_engine.js"
import { synthesizeAnswer } from "./synthesizer.js"

// ============================================================================
// Types
// ============================================================================

export type WorkflowState =
	| "ROUTE"
	| "RETRIEVE"
	| "PLAN"
	| "GENERATE"
	| "EXECUTE"
	| "REPAIR"
	| "SUCCESS"
	| "EXHAUSTED"
	| "SYNTHESIZE"

export type Transition =
	| { kind: "goto"; state: WorkflowState }
	| { kind: "finish" }

/**
 * Mutable record for one run. Owned by a single `run()` call and discarded
 * when it returns. The trace is append-only.
 */
export interface AgentRunState {
	readonly run_id: string
	readonly question: Question
	route: RouteDecision | null
	passages: RetrievedPassage[]
	constraints: Constraints
	candidate: CandidateQuery | null
	execution: ExecutionResult | null
	answer: FinalAnswer | null
	readonly trace: string[]
}

export interface HybridAgentOptions {
	/** Passages retrieved for rag and hybrid routes */
	topK?: number
	/** Repairs allowed after the first failed execution (capped at 2) */
	maxRepairs?: number
	/** Run the generation normalizer (on by default) */
	normalizeSql?: boolean
}

export interface HybridAgentDeps {
	retriever: PassageRetriever
	engine: RelationalEngine
	oracle: Oracle
	logger?: Logger
	options?: HybridAgentOptions
}

type StateHandler = (run: AgentRunState, ctx: PipelineContext) => Promise<Transition>

/** Upper bound on handler invocations per run; the longest legal path is 11 */
const MAX_STEPS = 32

function goto(state: WorkflowState): Transition {
	return { kind: "goto", state }
}

function appendTrace(run: AgentRunState, state: WorkflowState, detail: string): void {
	run.trace.push(detail ? `${state}: ${detail}` : state)
}

function clip(text: string, max = 120): string {
	const flat = text.replace(/\s+/g, " ").trim()
	return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat
}

// ============================================================================
// Agent
// ============================================================================

export class HybridAgent {
	private readonly retriever: PassageRetriever
	private readonly engine: RelationalEngine
	private readonly oracle: Oracle
	private readonly logger: Logger
	private readonly topK: number
	private readonly maxRepairs: number
	private readonly normalizeSql: boolean
	private readonly handlers: Record<WorkflowState, StateHandler>
	private schemaText: Promise<string> | null = null
	private knownTables: Promise<string[]> | null = null

	constructor(deps: HybridAgentDeps) {
		const options = deps.options ?? {}
		this.retriever = deps.retriever
		this.engine = deps.engine
		this.oracle = deps.oracle
		this.logger = deps.logger ?? silentLogger
		this.topK = Math.max(0, options.topK ?? DEFAULTS.topK)
		this.maxRepairs = Math.min(REPAIR_CONFIG.maxRepairs, Math.max(0, options.maxRepairs ?? REPAIR_CONFIG.maxRepairs))
		this.normalizeSql = options.normalizeSql ?? true

		this.handlers = {
			ROUTE: (run, ctx) => this.route(run, ctx),
			RETRIEVE: async run => this.retrieve(run),
			PLAN: (run, ctx) => this.plan(run, ctx),
			GENERATE: (run, ctx) => this.generate(run, ctx),
			EXECUTE: (run, ctx) => this.execute(run, ctx),
			REPAIR: (run, ctx) => this.repair(run, ctx),
			SUCCESS: async run => {
				appendTrace(run, "SUCCESS", `${run.execution?.rows.length ?? 0} rows`)
				return goto("SYNTHESIZE")
			},
			EXHAUSTED: async run => {
				appendTrace(run, "EXHAUSTED", `after ${run.candidate?.repair_count ?? 0} repairs`)
				return goto("SYNTHESIZE")
			},
			SYNTHESIZE: (run, ctx) => this.synthesize(run, ctx),
		}
	}

	/**
	 * Answer one question. Never throws for per-request failures; the
	 * response degrades instead (lower confidence, fallback answer).
	 */
	async run(question: string, formatHint = ""): Promise<RunResponse> {
		const startTime = Date.now()
		const run: AgentRunState = {
			run_id: uuidv4(),
			question: { text: question, format_hint: formatHint },
			route: null,
			passages: [],
			constraints: emptyConstraints(),
			candidate: null,
			execution: null,
			answer: null,
			trace: [],
		}
		const ctx: PipelineContext = { oracle: this.oracle, logger: this.logger, run_id: run.run_id }

		this.logger.info("Question received", { run_id: run.run_id, question, format_hint: formatHint })

		let state: WorkflowState = "ROUTE"
		for (let step = 0; step < MAX_STEPS; step++) {
			const transition: Transition = await this.handlers[state](run, ctx)
			if (transition.kind === "finish") break
			state = transition.state
		}

		const answer = run.answer ?? { value: "", explanation: "", confidence: 0, citations: [] }
		const response: RunResponse = {
			run_id: run.run_id,
			final_answer: answer.value,
			sql: run.candidate?.sql ?? "",
			confidence: answer.confidence,
			explanation: answer.explanation,
			citations: answer.citations,
			trace: [...run.trace],
			route: run.route,
			repair_count: run.candidate?.repair_count ?? 0,
		}

		this.logger.info("Run completed", {
			run_id: run.run_id,
			route: response.route,
			repair_count: response.repair_count,
			confidence: response.confidence,
			latency_ms: Date.now() - startTime,
		})
		return response
	}

	// ==========================================================================
	// Shared collaborators
	// ==========================================================================

	private async schema(ctx: PipelineContext): Promise<string> {
		this.schemaText ??= this.engine.describeSchema()
		try {
			return await this.schemaText
		} catch (error) {
			this.schemaText = null
			ctx.logger.warn("Schema description unavailable", { run_id: ctx.run_id, error: errorMessage(error) })
			return ""
		}
	}

	private async tables(ctx: PipelineContext): Promise<string[]> {
		this.knownTables ??= this.engine.tableNames()
		try {
			return await this.knownTables
		} catch (error) {
			this.knownTables = null
			ctx.logger.warn("Table list unavailable", { run_id: ctx.run_id, error: errorMessage(error) })
			return []
		}
	}

	// ==========================================================================
	// State handlers
	// ==========================================================================

	private async route(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		const route = await routeQuestion(run.question.text, ctx)
		run.route = route
		appendTrace(run, "ROUTE", route)
		return goto(route === "sql" ? "PLAN" : "RETRIEVE")
	}

	private retrieve(run: AgentRunState): Transition {
		run.passages = this.retriever.retrieve(run.question.text, this.topK)
		appendTrace(run, "RETRIEVE", `${run.passages.length} passages [${run.passages.map(p => p.id).join(", ")}]`)
		return goto("PLAN")
	}

	private async plan(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		run.constraints = await extractConstraints(
			{ question: run.question.text, passages: run.passages, schema: await this.schema(ctx) },
			ctx,
		)
		appendTrace(run, "PLAN", JSON.stringify(run.constraints))
		return goto(run.route === "rag" ? "SYNTHESIZE" : "GENERATE")
	}

	private async generate(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		const { candidate, applied } = await generateSQL(
			{
				question: run.question.text,
				schema: await this.schema(ctx),
				constraints: run.constraints,
				formatHint: run.question.format_hint,
			},
			ctx,
			{ normalize: this.normalizeSql },
		)
		run.candidate = candidate
		const rules = applied.length > 0 ? ` (normalized: ${applied.join(", ")})` : ""
		appendTrace(run, "GENERATE", `${clip(candidate.sql) || "<empty query>"}${rules}`)
		return goto("EXECUTE")
	}

	private async execute(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		const candidate = run.candidate ?? { sql: "", repair_count: 0 }
		run.candidate = candidate
		run.execution = await executeQuery(this.engine, candidate.sql, await this.tables(ctx), ctx)

		if (run.execution.success) {
			appendTrace(run, "EXECUTE", `ok, ${run.execution.rows.length} rows`)
			return goto("SUCCESS")
		}
		appendTrace(run, "EXECUTE", `failed: ${clip(run.execution.error ?? "unknown error")}`)
		return goto(candidate.repair_count < this.maxRepairs ? "REPAIR" : "EXHAUSTED")
	}

	private async repair(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		const candidate = run.candidate ?? { sql: "", repair_count: 0 }
		const outcome = await repairSQL(
			{ sql: candidate.sql, error: run.execution?.error ?? "", schema: await this.schema(ctx) },
			ctx,
		)
		run.candidate = { sql: outcome.sql, repair_count: candidate.repair_count + 1 }
		appendTrace(run, "REPAIR", `attempt ${run.candidate.repair_count}/${this.maxRepairs} via ${outcome.path}`)
		return goto("EXECUTE")
	}

	private async synthesize(run: AgentRunState, ctx: PipelineContext): Promise<Transition> {
		run.answer = await synthesizeAnswer(
			{
				question: run.question.text,
				formatHint: run.question.format_hint,
				execution: run.execution,
				passages: run.passages,
				repairCount: run.candidate?.repair_count ?? 0,
			},
			ctx,
		)
		appendTrace(run, "SYNTHESIZE", `confidence ${run.answer.confidence}`)
		return { kind: "finish" }
	}
}
