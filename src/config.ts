/**
 * Shared types and constants for the hybrid analyst pipeline.
 *
 * Every stage (router, retriever, planner, generator, executor, repair,
 * synthesizer) reads and writes the shapes declared here.
 */

// ============================================================================
// JSON values
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type JsonRecord = { [key: string]: JsonValue }

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

// ============================================================================
// Request data model
// ============================================================================

/** Immutable request input */
export interface Question {
	readonly text: string
	/** `int`, `float`, `list[...]`, a `{...}` record hint, free text, or empty */
	readonly format_hint: string
}

export type RouteDecision = "rag" | "sql" | "hybrid"

export interface RetrievedPassage {
	/** `{source}::chunk{index}` */
	id: string
	text: string
	source: string
	/** Cosine similarity in [0, 1] */
	relevance_score: number
}

export interface DateRange {
	start: string
	end: string
}

/**
 * Structured filters extracted by the planner. Always fully shaped:
 * absent values are null or empty arrays, never undefined.
 */
export interface Constraints {
	date_range: DateRange | null
	kpi_formula: string | null
	categories: string[]
	entities: string[]
}

export function emptyConstraints(): Constraints {
	return { date_range: null, kpi_formula: null, categories: [], entities: [] }
}

export interface CandidateQuery {
	sql: string
	/** Number of REPAIR transitions already consumed */
	repair_count: number
}

export type CellValue = string | number | null

export interface ExecutionResult {
	success: boolean
	rows: CellValue[][]
	column_names: string[]
	error: string | null
	/** Canonical table names found in the executed query (success only) */
	tables_referenced: string[]
}

export interface FinalAnswer {
	value: JsonValue
	/** At most 2 sentences and 150 characters */
	explanation: string
	confidence: number
	/** Table names and passage ids, no duplicates */
	citations: string[]
}

/**
 * Response returned to callers of HybridAgent.run()
 */
export interface RunResponse {
	run_id: string
	final_answer: JsonValue
	/** Last candidate query attempted, empty when generation never ran */
	sql: string
	confidence: number
	explanation: string
	citations: string[]
	trace: string[]
	route: RouteDecision | null
	repair_count: number
}

// ============================================================================
// Collaborators
// ============================================================================

export type OracleStage = "route" | "constraints" | "generate_sql" | "repair_sql" | "synthesize"

export interface OracleRequest {
	stage: OracleStage
	/** Named prompt fields (question, schema, documents, ...) */
	fields: Record<string, string>
	/** Rendered prompt text for providers that take a single prompt */
	prompt: string
}

/**
 * Text-generation oracle. The same request may yield different text on
 * every call; callers normalize what comes back.
 */
export interface Oracle {
	invoke(request: OracleRequest): Promise<string>
}

export type LogData = Record<string, unknown>

export interface Logger {
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
	debug(message: string, data?: LogData): void
}

/** Per-request collaborators handed to every stage function */
export interface PipelineContext {
	oracle: Oracle
	logger: Logger
	run_id: string
}

// ============================================================================
// Errors
// ============================================================================

export type AnalystErrorType = "configuration" | "oracle" | "execution" | "timeout"

/**
 * Error types for structured error handling.
 *
 * Only "configuration" errors escape to callers, and only at construction
 * time. The others are recovered inside a run.
 */
export class AnalystError extends Error {
	constructor(
		public type: AnalystErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AnalystError"
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Pipeline constants
// ============================================================================

/**
 * Repair loop configuration
 */
export const REPAIR_CONFIG = {
	/** Additional executions allowed after the first failure */
	maxRepairs: 2,
}

export const CONFIDENCE_CONFIG = {
	base: 0.5,
	executionBonus: 0.3,
	retrievalWeight: 0.2,
	penaltyPerRepair: 0.1,
}

export const SYNTHESIS_LIMITS = {
	maxRows: 5,
	maxPassages: 3,
	passageChars: 200,
	maxSentences: 2,
	maxExplanationChars: 150,
	maxListRecords: 3,
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	topK: 3,
	maxRows: 1000,
	maxFeatures: 1000,
	keyTables: ["Categories", "Products", "Order Details", "Orders", "Customers"],
}
